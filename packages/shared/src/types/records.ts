/**
 * Pipeline stage names. A FailureRecord names the stage that failed.
 */
export type PipelineStage = 'Discover' | 'Read' | 'Decode' | 'Classify' | 'Sanitize' | 'Count';

/**
 * A file the walker admitted. Produced once, consumed once.
 */
export interface CandidatePath {
  absolutePath: string;
  /** Relative to the run root, forward slashes */
  relativePath: string;
  sizeBytes: number;
}

/**
 * A successfully processed file, as rendered into the document.
 */
export interface FileRecord {
  readonly name: string;
  readonly absolutePath: string;
  readonly relativePath: string;
  readonly language: string;
  readonly encoding: string;
  /** Raw size on disk */
  readonly sizeBytes: number;
  /** Tokens in the sanitized text before truncation */
  readonly originalTokenCount: number;
  /** Tokens in `content` */
  readonly tokenCount: number;
  readonly content: string;
  readonly truncated: boolean;
  /** Set when this record pushed the running total past the token ceiling */
  readonly overflow: boolean;
}

/**
 * A FileRecord before the orchestrator has placed it against the ceiling.
 */
export type ProcessedFile = Omit<FileRecord, 'overflow'>;

export interface FailureRecord {
  readonly relativePath: string;
  readonly stage: PipelineStage;
  readonly reason: string;
}

export type SkipReason = 'binary-content' | 'binary-extension' | 'too-large' | 'overflow';

/**
 * A file deliberately left out of the document. Not an error.
 */
export interface SkipRecord {
  readonly relativePath: string;
  readonly reason: SkipReason;
  readonly sizeBytes: number;
}

export type OverflowPolicy = 'keep' | 'drop' | 'abort';

export type StopReason = 'completed' | 'cancelled' | 'token-ceiling';

export interface TokenBudget {
  /** 0 disables per-file truncation */
  maxTokensPerFile: number;
  /** Context ceiling for the whole document */
  ceiling: number;
  overflowPolicy: OverflowPolicy;
}

export interface RunSummary {
  readonly root: string;
  readonly model: string;
  readonly encoding: string;
  readonly budget: TokenBudget;
  /** Every entry the walker reached and did not prune */
  readonly discovered: number;
  readonly processed: number;
  readonly skippedBinary: number;
  readonly failed: number;
  /** Discovered but never dispatched because the run stopped early */
  readonly unprocessed: number;
  readonly truncated: number;
  readonly overflowed: number;
  readonly totalTokens: number;
  readonly totalBytes: number;
  readonly languages: Readonly<Record<string, number>>;
  readonly encodings: Readonly<Record<string, number>>;
  readonly ignoreRuleCount: number;
  readonly workerCount: number;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly durationMs: number;
  readonly peakMemoryBytes: number;
  readonly cancelled: boolean;
  readonly stopReason: StopReason;
}
