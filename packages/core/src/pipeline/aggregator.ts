import {
  comparePaths,
  toFailureReason,
  type FailureRecord,
  type FileRecord,
  type OverflowPolicy,
  type ProcessedFile,
  type RunSummary,
  type SkipRecord,
  type StopReason,
  type TokenBudget,
} from '@codepack/shared';
import type { FileOutcome } from '../processor';

const BINARY_SKIPS = new Set<SkipRecord['reason']>(['binary-content', 'binary-extension', 'too-large']);

export interface Acceptance {
  /** Running total after this outcome, in completion order */
  runningTotal: number;
  /** True only for the outcome that first took the total past the ceiling */
  crossedCeiling: boolean;
}

export interface RunContext {
  root: string;
  model: string;
  encoding: string;
  budget: TokenBudget;
  ignoreRuleCount: number;
  workerCount: number;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  cancelled: boolean;
  stopReason: StopReason;
}

export interface AggregateResult {
  summary: RunSummary;
  /** Records in the document, sorted by relative path */
  records: FileRecord[];
  failures: FailureRecord[];
  skipped: SkipRecord[];
}

function sortedBy<T extends { relativePath: string }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => comparePaths(a.relativePath, b.relativePath));
}

function histogram(records: readonly FileRecord[], key: 'language' | 'encoding'): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const record of records) {
    counts[record[key]] = (counts[record[key]] ?? 0) + 1;
  }
  return Object.fromEntries(Object.entries(counts).sort(([a], [b]) => comparePaths(a, b)));
}

/**
 * Sole owner of a run's collections and token total.
 *
 * Every method is synchronous, so with workers on one event loop there is
 * exactly one writer at a time.
 */
export class RunAggregator {
  private discovered = 0;
  private runningTotal = 0;
  private ceilingCrossed = false;
  private peakMemoryBytes = 0;
  private readonly processed: ProcessedFile[] = [];
  private readonly skipped: SkipRecord[] = [];
  private readonly failures: FailureRecord[] = [];

  constructor(
    private readonly ceiling: number,
    private readonly sampleMemory: () => number = () => process.memoryUsage.rss(),
  ) {}

  /** Counts a candidate handed to the queue. */
  noteDiscovered(): void {
    this.discovered++;
  }

  /** A walker error counts as both discovered and failed. */
  acceptDiscoveryFailure(relativePath: string, error: unknown): FailureRecord {
    const failure = Object.freeze({ relativePath, stage: 'Discover' as const, reason: toFailureReason(error) });
    this.discovered++;
    this.failures.push(failure);
    return failure;
  }

  accept(outcome: FileOutcome): Acceptance {
    this.peakMemoryBytes = Math.max(this.peakMemoryBytes, this.sampleMemory());

    switch (outcome.kind) {
      case 'done':
        this.processed.push(outcome.file);
        this.runningTotal += outcome.file.tokenCount;
        break;
      case 'skipped':
        this.skipped.push(outcome.skip);
        break;
      case 'failed':
        this.failures.push(outcome.failure);
        break;
    }

    const crossedCeiling = !this.ceilingCrossed && this.runningTotal > this.ceiling;
    if (crossedCeiling) this.ceilingCrossed = true;
    return { runningTotal: this.runningTotal, crossedCeiling };
  }

  /**
   * Places processed files against the ceiling in path order and builds the
   * frozen summary. Under `drop`, a file that would take the document past
   * the ceiling is left out and listed as skipped `overflow`; under `keep`
   * and `abort` it stays, flagged.
   */
  finalize(context: RunContext): AggregateResult {
    const policy: OverflowPolicy = context.budget.overflowPolicy;
    const records: FileRecord[] = [];
    const overflowSkips: SkipRecord[] = [];
    let total = 0;
    let overflowed = 0;

    for (const file of sortedBy(this.processed)) {
      const overflow = total + file.tokenCount > context.budget.ceiling;
      if (overflow) overflowed++;
      if (overflow && policy === 'drop') {
        overflowSkips.push(Object.freeze({ relativePath: file.relativePath, reason: 'overflow', sizeBytes: file.sizeBytes }));
        continue;
      }
      total += file.tokenCount;
      records.push(Object.freeze({ ...file, overflow }));
    }

    const skippedBinary = this.skipped.filter((skip) => BINARY_SKIPS.has(skip.reason)).length;
    const accounted = this.processed.length + skippedBinary + this.failures.length;

    const summary: RunSummary = Object.freeze({
      root: context.root,
      model: context.model,
      encoding: context.encoding,
      budget: Object.freeze({ ...context.budget }),
      discovered: this.discovered,
      processed: this.processed.length,
      skippedBinary,
      failed: this.failures.length,
      unprocessed: Math.max(0, this.discovered - accounted),
      truncated: this.processed.filter((file) => file.truncated).length,
      overflowed,
      totalTokens: total,
      totalBytes: records.reduce((sum, record) => sum + record.sizeBytes, 0),
      languages: Object.freeze(histogram(records, 'language')),
      encodings: Object.freeze(histogram(records, 'encoding')),
      ignoreRuleCount: context.ignoreRuleCount,
      workerCount: context.workerCount,
      startedAt: context.startedAt.toISOString(),
      finishedAt: context.finishedAt.toISOString(),
      durationMs: context.durationMs,
      peakMemoryBytes: this.peakMemoryBytes,
      cancelled: context.cancelled,
      stopReason: context.stopReason,
    });

    return {
      summary,
      records,
      failures: sortedBy(this.failures),
      skipped: sortedBy([...this.skipped, ...overflowSkips]),
    };
  }
}
