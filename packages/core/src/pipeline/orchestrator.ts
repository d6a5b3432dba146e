import os from 'node:os';
import { randomUUID } from 'node:crypto';
import {
  eventBase,
  SilentLogger,
  type CandidatePath,
  type FileFailed,
  type FileProcessed,
  type FileSkipped,
  type Logger,
  type MaybePromise,
  type PackConfig,
  type PackEvent,
  type StopReason,
  type TokenBudget,
} from '@codepack/shared';
import {
  compile,
  DirectoryWalker,
  loadDefaultRules,
  loadSupplementalRules,
  parseRules,
  resolveRoot,
  type IgnoreRuleSet,
} from '@codepack/repo';
import { TokenAccountant } from '../tokens';
import { extensionFilter, FileProcessor, type FileOutcome, type FileReader } from '../processor';
import { RunAggregator, type AggregateResult } from './aggregator';
import { BoundedQueue } from './queue';

type OutcomeEvent =
  | Pick<FileProcessed, 'type' | 'payload'>
  | Pick<FileSkipped, 'type' | 'payload'>
  | Pick<FileFailed, 'type' | 'payload'>;

/** Queue slots per worker. */
export const QUEUE_SLOTS_PER_WORKER = 4;

export interface RunOptions {
  /** Aborting finishes in-flight files and returns a partial result */
  signal?: AbortSignal;
  logger?: Logger;
  /** Absolute paths never read, e.g. the output document */
  exclude?: readonly string[];
  runId?: string;
}

export interface RunResult extends AggregateResult {
  runId: string;
  ruleSet: IgnoreRuleSet;
}

export interface OrchestratorDeps {
  accountant?: TokenAccountant;
  walker?: DirectoryWalker;
  readFile?: FileReader;
}

/**
 * Builds the rule set for a run: built-in defaults, then the project's
 * ignore files (or the explicit one), then `extraIgnorePatterns`.
 */
export async function buildRuleSet(root: string, config: PackConfig): Promise<IgnoreRuleSet> {
  if (config.bypassIgnore) return compile([], [], true);
  const [defaults, supplemental] = await Promise.all([
    loadDefaultRules(),
    loadSupplementalRules(root, config.ignoreFile),
  ]);
  const extra = parseRules(config.extraIgnorePatterns.join('\n'), 'config');
  return compile(defaults, [...supplemental, ...extra]);
}

/**
 * Drives a run: the walker feeds a bounded queue, a pool of workers takes
 * candidates through the FileProcessor, and a single aggregator collects
 * every outcome.
 */
export class ProcessingOrchestrator {
  private readonly accountant: TokenAccountant;
  private readonly walker: DirectoryWalker;
  private readonly readFile?: FileReader;

  constructor(deps: OrchestratorDeps = {}) {
    this.accountant = deps.accountant ?? new TokenAccountant();
    this.walker = deps.walker ?? new DirectoryWalker();
    this.readFile = deps.readFile;
  }

  /**
   * @throws SetupError when the root or an explicit ignore file is unusable.
   * Everything after that is recorded per file.
   */
  async run(root: string, config: PackConfig, options: RunOptions = {}): Promise<RunResult> {
    const runId = options.runId ?? randomUUID();
    const logger = options.logger ?? new SilentLogger();
    const startedAt = new Date();
    const started = performance.now();

    const absoluteRoot = await resolveRoot(root);
    const ruleSet = await buildRuleSet(absoluteRoot, config);
    const profile = await this.accountant.load(config.modelName);

    const workerCount = config.workerCount ?? os.availableParallelism();
    const budget: TokenBudget = {
      maxTokensPerFile: config.maxTokensPerFile,
      ceiling: config.maxTotalTokens ?? profile.contextWindow,
      overflowPolicy: config.overflowPolicy,
    };

    const processor = new FileProcessor(
      this.accountant,
      {
        model: config.modelName,
        maxTokensPerFile: config.maxTokensPerFile,
        maxFileSizeBytes: config.maxFileSizeBytes,
        fallbackEncodings: config.fallbackEncodings,
        stripComments: config.stripComments,
        maxBlankLines: config.maxBlankLines,
      },
      this.readFile,
    );
    const aggregator = new RunAggregator(budget.ceiling);
    const queue = new BoundedQueue<CandidatePath>(workerCount * QUEUE_SLOTS_PER_WORKER);
    const admit = extensionFilter(config);

    // Stops producer and workers, for cancellation and the abort policy.
    const stop = new AbortController();
    let ceilingStop = false;
    const onCancel = () => stop.abort();
    stop.signal.addEventListener('abort', () => queue.close(), { once: true });
    if (options.signal?.aborted) stop.abort();
    options.signal?.addEventListener('abort', onCancel, { once: true });

    const pendingLogs: Array<MaybePromise<void>> = [];
    const emit = (event: PackEvent, target: Logger = logger) => {
      pendingLogs.push(target.log(event));
    };

    emit({
      ...eventBase(runId),
      type: 'RunStarted',
      payload: { root: absoluteRoot, model: config.modelName, workerCount, ignoreRuleCount: ruleSet.rules.length },
    });
    await logger.debug(`Packing ${absoluteRoot} with ${workerCount} workers (${profile.encoding})`);

    const report = (outcome: FileOutcome, target: Logger = logger) => {
      emit({ ...eventBase(runId), ...outcomeEvent(outcome) }, target);
    };

    const produce = async () => {
      try {
        const candidates = this.walker.walk(absoluteRoot, ruleSet, {
          signal: stop.signal,
          exclude: options.exclude,
          onError: (relativePath, error) => {
            report({ kind: 'failed', failure: aggregator.acceptDiscoveryFailure(relativePath, error) });
          },
        });
        for await (const candidate of candidates) {
          if (!admit(candidate.relativePath)) continue;
          aggregator.noteDiscovered();
          if (!(await queue.put(candidate))) break;
        }
      } finally {
        queue.close();
      }
    };

    const consume = async (worker: number) => {
      const workerLogger = logger.child({ worker });
      while (!stop.signal.aborted) {
        const candidate = await queue.take();
        if (candidate === undefined) return;

        const outcome = await processor.process(candidate);
        const { crossedCeiling, runningTotal } = aggregator.accept(outcome);
        report(outcome, workerLogger);

        if (crossedCeiling) {
          emit(
            {
              ...eventBase(runId),
              type: 'TokenCeilingExceeded',
              payload: { ceiling: budget.ceiling, runningTotal, path: candidate.relativePath },
            },
            workerLogger,
          );
          await logger.warn(`Token total ${runningTotal} exceeds the ${budget.ceiling}-token ceiling`);
          if (budget.overflowPolicy === 'abort') {
            ceilingStop = true;
            stop.abort();
          }
        }
      }
    };

    try {
      await Promise.all([produce(), ...Array.from({ length: workerCount }, (_, i) => consume(i + 1))]);
    } finally {
      options.signal?.removeEventListener('abort', onCancel);
    }

    const cancelled = options.signal?.aborted === true;
    const stopReason: StopReason = cancelled ? 'cancelled' : ceilingStop ? 'token-ceiling' : 'completed';
    const result = aggregator.finalize({
      root: absoluteRoot,
      model: config.modelName,
      encoding: profile.encoding,
      budget,
      ignoreRuleCount: ruleSet.rules.length,
      workerCount,
      startedAt,
      finishedAt: new Date(),
      durationMs: Math.round(performance.now() - started),
      cancelled,
      stopReason,
    });

    const { summary } = result;
    emit({
      ...eventBase(runId),
      type: 'RunFinished',
      payload: {
        discovered: summary.discovered,
        processed: summary.processed,
        skippedBinary: summary.skippedBinary,
        failed: summary.failed,
        totalTokens: summary.totalTokens,
        durationMs: summary.durationMs,
        stopReason,
      },
    });
    await Promise.all(pendingLogs);

    return { ...result, runId, ruleSet };
  }
}

/** Event type and payload for a file's terminal state. */
function outcomeEvent(outcome: FileOutcome): OutcomeEvent {
  switch (outcome.kind) {
    case 'done':
      return {
        type: 'FileProcessed',
        payload: {
          path: outcome.file.relativePath,
          language: outcome.file.language,
          tokenCount: outcome.file.tokenCount,
          truncated: outcome.file.truncated,
        },
      };
    case 'skipped':
      return { type: 'FileSkipped', payload: { path: outcome.skip.relativePath, reason: outcome.skip.reason } };
    case 'failed':
      return {
        type: 'FileFailed',
        payload: { path: outcome.failure.relativePath, stage: outcome.failure.stage, reason: outcome.failure.reason },
      };
  }
}
