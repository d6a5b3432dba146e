import {
  PackConfigSchema,
  type Logger,
  type PackConfig,
  type PackConfigInput,
  type PackEvent,
} from '@codepack/shared';
import { TokenAccountant, type Tokenizer } from '../tokens';

/** Defaults with a small worker pool, overridable per test. */
export function testConfig(overrides: PackConfigInput = {}): PackConfig {
  return PackConfigSchema.parse({ workerCount: 2, includeTimestamp: false, ...overrides });
}

/** One token per code point keeps expected counts easy to trace. */
export const charTokenizer: Tokenizer = {
  encode: (text) => Array.from(text, (char) => char.codePointAt(0) ?? 0),
  decode: (tokens) => String.fromCodePoint(...tokens),
};

/** Accountant whose every encoding is {@link charTokenizer}, loaded for `model`. */
export async function charAccountant(model = 'gpt-4o'): Promise<TokenAccountant> {
  const load = async () => charTokenizer;
  const accountant = new TokenAccountant({
    loaders: { r50k_base: load, p50k_base: load, p50k_edit: load, cl100k_base: load, o200k_base: load },
  });
  await accountant.load(model);
  return accountant;
}

/** Keeps every event, message and child scope for assertions. Children share the recording. */
export class RecordingLogger implements Logger {
  readonly events: PackEvent[] = [];
  readonly messages: string[] = [];
  readonly scopes: Record<string, unknown>[] = [];

  log(event: PackEvent): void {
    this.events.push(event);
  }

  debug(message: string): void {
    this.messages.push(`debug:${message}`);
  }

  info(message: string): void {
    this.messages.push(`info:${message}`);
  }

  warn(message: string): void {
    this.messages.push(`warn:${message}`);
  }

  error(error: Error, message?: string): void {
    this.messages.push(`error:${message ?? error.message}`);
  }

  child(bindings: Record<string, unknown>): Logger {
    this.scopes.push(bindings);
    return this;
  }
}
