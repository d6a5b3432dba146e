import type { Command } from 'commander';
import { z } from 'zod';
import { UsageError } from '@codepack/shared';

/** Options on the root program, shared by every command. */
export const GlobalOptionsSchema = z.object({
  json: z.boolean().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});
export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

const list = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item !== ''),
  );

/** Flags that map onto configuration keys. Numbers arrive as strings. */
export const ConfigFlagsSchema = z.object({
  model: z.string().optional(),
  maxTokensPerFile: z.coerce.number().optional(),
  maxTotalTokens: z.coerce.number().optional(),
  overflow: z.string().optional(),
  format: z.string().optional(),
  metadata: z.boolean().optional(),
  timestamp: z.boolean().optional(),
  workers: z.coerce.number().optional(),
  maxFileSize: z.coerce.number().optional(),
  stripComments: z.boolean().optional(),
  maxBlankLines: z.coerce.number().optional(),
  fallbackEncodings: list.optional(),
  ignoreFile: z.string().optional(),
  bypassIgnore: z.boolean().optional(),
  exclude: z.array(z.string()).optional(),
  includeExt: list.optional(),
  excludeExt: list.optional(),
});
export type ConfigFlags = z.infer<typeof ConfigFlagsSchema>;

/**
 * Option values the user actually passed. Commander fills defaults for
 * `--no-*` flags, which must not override config files.
 */
export function explicitOptions(command: Command): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(command.opts())) {
    const source = command.getOptionValueSource(key);
    if (source !== undefined && source !== 'default') values[key] = value;
  }
  return values;
}

/**
 * @throws UsageError listing each malformed option.
 */
export function parseOptions<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `--${toFlag(i.path.join('.'))}: ${i.message}`).join('; ');
    throw new UsageError(`Invalid options: ${issues}`);
  }
  return result.data;
}

function toFlag(key: string): string {
  return key.replace(/[A-Z]/g, (ch) => `-${ch.toLowerCase()}`);
}

/**
 * Configuration overrides from CLI flags, keyed like the config file. Enum
 * values pass through unchecked; the config schema validates them.
 */
export function toConfigInput(flags: ConfigFlags): Record<string, unknown> {
  const input: Record<string, unknown> = {
    modelName: flags.model,
    maxTokensPerFile: flags.maxTokensPerFile,
    maxTotalTokens: flags.maxTotalTokens,
    overflowPolicy: flags.overflow,
    outputFormat: flags.format,
    includeMetadata: flags.metadata,
    includeTimestamp: flags.timestamp,
    workerCount: flags.workers,
    maxFileSizeBytes: flags.maxFileSize,
    stripComments: flags.stripComments,
    maxBlankLines: flags.maxBlankLines,
    fallbackEncodings: flags.fallbackEncodings,
    ignoreFile: flags.ignoreFile,
    bypassIgnore: flags.bypassIgnore,
    extraIgnorePatterns: flags.exclude,
    includeExtensions: flags.includeExt,
    excludeExtensions: flags.excludeExt,
  };
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}
