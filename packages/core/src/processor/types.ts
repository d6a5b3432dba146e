import type { FailureRecord, ProcessedFile, SkipRecord } from '@codepack/shared';

/**
 * Terminal state of one file. Failures are values; processing never throws.
 */
export type FileOutcome =
  | { readonly kind: 'done'; readonly file: ProcessedFile }
  | { readonly kind: 'skipped'; readonly skip: SkipRecord }
  | { readonly kind: 'failed'; readonly failure: FailureRecord };

export type FileReader = (absolutePath: string) => Promise<Uint8Array>;

export interface ProcessorOptions {
  model: string;
  /** 0 disables truncation */
  maxTokensPerFile: number;
  maxFileSizeBytes: number;
  fallbackEncodings: readonly string[];
  stripComments: boolean;
  maxBlankLines: number;
}
