import { CountError, SilentLogger, type Logger } from '@codepack/shared';
import { lookupModel, type EncodingName, type ModelProfile } from './models';

/**
 * Appended to content cut down to its per-file budget. Its tokens count
 * against the budget.
 */
export const TRUNCATION_MARKER = '\n... [content truncated to fit token budget]\n';

/** The subset of a gpt-tokenizer encoding module used here. */
export interface Tokenizer {
  encode(text: string, options?: { disallowedSpecial?: Set<string> }): number[];
  decode(tokens: number[]): string;
}

const LOADERS: Record<EncodingName, () => Promise<Tokenizer>> = {
  r50k_base: () => import('gpt-tokenizer/encoding/r50k_base'),
  p50k_base: () => import('gpt-tokenizer/encoding/p50k_base'),
  p50k_edit: () => import('gpt-tokenizer/encoding/p50k_edit'),
  cl100k_base: () => import('gpt-tokenizer/encoding/cl100k_base'),
  o200k_base: () => import('gpt-tokenizer/encoding/o200k_base'),
};

// Special-token strings in source files are counted as plain text.
const PLAIN_TEXT = { disallowedSpecial: new Set<string>() };

export interface FitResult {
  readonly text: string;
  readonly tokenCount: number;
  readonly originalTokenCount: number;
  readonly truncated: boolean;
}

export interface TokenAccountantOptions {
  logger?: Logger;
  /** Replaces the gpt-tokenizer loaders, mainly for tests */
  loaders?: Partial<Record<EncodingName, () => Promise<Tokenizer>>>;
}

/**
 * Counts tokens per model and fits text into a token budget.
 *
 * Encodings are loaded on demand with {@link load}; counting is synchronous
 * afterwards so workers never wait on each other.
 */
export class TokenAccountant {
  private readonly logger: Logger;
  private readonly loaders: Record<EncodingName, () => Promise<Tokenizer>>;
  private readonly tokenizers = new Map<EncodingName, Tokenizer>();
  private readonly pending = new Map<EncodingName, Promise<Tokenizer>>();
  private readonly warned = new Set<string>();

  constructor(options: TokenAccountantOptions = {}) {
    this.logger = options.logger ?? new SilentLogger();
    this.loaders = { ...LOADERS, ...options.loaders };
  }

  /**
   * Profile for `model`. An unknown name falls back to the default encoding
   * and context window with one warning per name; it is never an error.
   */
  resolveModel(model: string): ModelProfile {
    const profile = lookupModel(model);
    if (!profile.known && !this.warned.has(model)) {
      this.warned.add(model);
      void this.logger.warn(
        `Unknown model "${model}"; counting with ${profile.encoding} and a ${profile.contextWindow}-token context window`,
      );
    }
    return profile;
  }

  /**
   * Loads the encoding `model` needs.
   *
   * @throws CountError when the encoding module cannot be loaded.
   */
  async load(model: string): Promise<ModelProfile> {
    const profile = this.resolveModel(model);
    if (this.tokenizers.has(profile.encoding)) return profile;

    let loading = this.pending.get(profile.encoding);
    if (!loading) {
      loading = this.loaders[profile.encoding]();
      this.pending.set(profile.encoding, loading);
    }

    try {
      this.tokenizers.set(profile.encoding, await loading);
    } catch (error) {
      this.pending.delete(profile.encoding);
      throw new CountError(model, `Cannot load the ${profile.encoding} encoding`, { cause: error });
    }
    return profile;
  }

  /**
   * @throws CountError when the model's encoding was not loaded or fails.
   */
  countTokens(model: string, text: string): number {
    return this.encode(model, text).length;
  }

  /**
   * Cuts `text` from the end until it fits `maxTokens`, marker included.
   *
   * The kept part is always a prefix of `text`, shortened to the last line
   * break when one falls in its second half. When even the marker does not
   * fit, the text is cut to `maxTokens` without it. `maxTokens <= 0` means
   * no limit.
   */
  fitToBudget(model: string, text: string, maxTokens: number): FitResult {
    const tokens = this.encode(model, text);
    const originalTokenCount = tokens.length;
    if (maxTokens <= 0 || originalTokenCount <= maxTokens) {
      return { text, tokenCount: originalTokenCount, originalTokenCount, truncated: false };
    }

    const tokenizer = this.tokenizerFor(model);
    const markerCost = this.countTokens(model, TRUNCATION_MARKER);

    if (markerCost >= maxTokens) {
      let budget = maxTokens;
      for (;;) {
        const prefix = decodePrefix(tokenizer, text, tokens, budget);
        const count = this.countTokens(model, prefix);
        if (count <= maxTokens) {
          return { text: prefix, tokenCount: count, originalTokenCount, truncated: true };
        }
        budget -= Math.max(1, count - maxTokens);
      }
    }

    let budget = maxTokens - markerCost;
    for (;;) {
      const prefix = toLineBoundary(decodePrefix(tokenizer, text, tokens, budget));
      const candidate = prefix + TRUNCATION_MARKER;
      const count = this.countTokens(model, candidate);
      if (count <= maxTokens || budget <= 0) {
        return { text: candidate, tokenCount: count, originalTokenCount, truncated: true };
      }
      // Merges across the seam can cost more than the parts; shrink and re-measure.
      budget -= Math.max(1, count - maxTokens);
    }
  }

  private tokenizerFor(model: string): Tokenizer {
    const { encoding } = lookupModel(model);
    const tokenizer = this.tokenizers.get(encoding);
    if (!tokenizer) {
      throw new CountError(model, `Encoding ${encoding} is not loaded`);
    }
    return tokenizer;
  }

  private encode(model: string, text: string): number[] {
    const tokenizer = this.tokenizerFor(model);
    try {
      return tokenizer.encode(text, PLAIN_TEXT);
    } catch (error) {
      throw new CountError(model, `Token counting failed for ${model}`, { cause: error });
    }
  }
}

/**
 * Longest decoded prefix of at most `count` tokens that is also a prefix of
 * `text`. Cuts inside a multi-byte character decode to U+FFFD and are
 * backed off.
 */
function decodePrefix(tokenizer: Tokenizer, text: string, tokens: number[], count: number): string {
  for (let n = Math.min(Math.max(count, 0), tokens.length); n > 0; n--) {
    const decoded = tokenizer.decode(tokens.slice(0, n));
    if (text.startsWith(decoded)) return decoded;
  }
  return '';
}

function toLineBoundary(prefix: string): string {
  const lastNewline = prefix.lastIndexOf('\n');
  return lastNewline >= prefix.length / 2 ? prefix.slice(0, lastNewline + 1) : prefix;
}
