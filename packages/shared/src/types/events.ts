import type { PipelineStage, SkipReason, StopReason } from './records';

/**
 * Base interface for all codepack events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted once the root and ignore rules are validated and workers start.
 */
export interface RunStarted extends BaseEvent {
  type: 'RunStarted';
  payload: {
    root: string;
    model: string;
    workerCount: number;
    ignoreRuleCount: number;
  };
}

/** Emitted for every file that made it into the result set */
export interface FileProcessed extends BaseEvent {
  type: 'FileProcessed';
  payload: {
    path: string;
    language: string;
    tokenCount: number;
    truncated: boolean;
  };
}

/** Emitted when a file leaves the pipeline without being an error */
export interface FileSkipped extends BaseEvent {
  type: 'FileSkipped';
  payload: {
    path: string;
    reason: SkipReason;
  };
}

/** Emitted when a stage fails for one file */
export interface FileFailed extends BaseEvent {
  type: 'FileFailed';
  payload: {
    path: string;
    stage: PipelineStage;
    reason: string;
  };
}

/** Emitted the first time the running total crosses the ceiling */
export interface TokenCeilingExceeded extends BaseEvent {
  type: 'TokenCeilingExceeded';
  payload: {
    ceiling: number;
    runningTotal: number;
    path: string;
  };
}

/** Emitted after all workers have joined */
export interface RunFinished extends BaseEvent {
  type: 'RunFinished';
  payload: {
    discovered: number;
    processed: number;
    skippedBinary: number;
    failed: number;
    totalTokens: number;
    durationMs: number;
    stopReason: StopReason;
  };
}

/** Emitted when the output document has been written */
export interface DocumentWritten extends BaseEvent {
  type: 'DocumentWritten';
  payload: {
    path: string;
    format: string;
    bytes: number;
  };
}

export type PackEvent =
  | RunStarted
  | FileProcessed
  | FileSkipped
  | FileFailed
  | TokenCeilingExceeded
  | RunFinished
  | DocumentWritten;

export type PackEventType = PackEvent['type'];

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Common fields for a new event stamped now.
 */
export function eventBase(runId: string, now: Date = new Date()): Omit<BaseEvent, 'type'> {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: now.toISOString(),
    runId,
  };
}
