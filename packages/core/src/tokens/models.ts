import { z } from 'zod';
import table from './models.json';

export const EncodingNameSchema = z.enum(['r50k_base', 'p50k_base', 'p50k_edit', 'cl100k_base', 'o200k_base']);
export type EncodingName = z.infer<typeof EncodingNameSchema>;

const ProfileSchema = z.object({
  encoding: EncodingNameSchema,
  contextWindow: z.number().int().positive(),
});

const ModelTableSchema = z.object({
  default: ProfileSchema,
  models: z.record(ProfileSchema),
  prefixes: z.array(ProfileSchema.extend({ prefix: z.string().min(1) })),
});

export interface ModelProfile {
  /** Name as requested */
  readonly model: string;
  readonly encoding: EncodingName;
  readonly contextWindow: number;
  /** False when the defaults were substituted for an unrecognized name */
  readonly known: boolean;
}

const MODELS = ModelTableSchema.parse(table);
// Longest prefix wins.
const PREFIXES = [...MODELS.prefixes].sort((a, b) => b.prefix.length - a.prefix.length);

/**
 * Looks a model up by exact name, then by prefix. Unrecognized names get
 * the default profile with `known: false`.
 */
export function lookupModel(model: string): ModelProfile {
  const name = model.trim();
  const exact = Object.prototype.hasOwnProperty.call(MODELS.models, name) ? MODELS.models[name] : undefined;
  if (exact) return { model, ...exact, known: true };

  const byPrefix = PREFIXES.find((entry) => name.startsWith(entry.prefix));
  if (byPrefix) {
    return { model, encoding: byPrefix.encoding, contextWindow: byPrefix.contextWindow, known: true };
  }

  return { model, ...MODELS.default, known: false };
}

/** Every exactly-named model, sorted. */
export function knownModels(): string[] {
  return Object.keys(MODELS.models).sort();
}
