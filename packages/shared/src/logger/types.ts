import type { PackEvent } from '../types/events';

export type MaybePromise<T> = T | Promise<T>;

/**
 * Where a run reports what it does. Structured {@link PackEvent}s go through
 * `log`; the level methods carry plain diagnostics for a person reading
 * stderr. Implementations decide which of the two they keep.
 */
export interface Logger {
  log(event: PackEvent): MaybePromise<void>;
  debug(message: string): MaybePromise<void>;
  info(message: string): MaybePromise<void>;
  warn(message: string): MaybePromise<void>;
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * A logger for one part of the run, e.g. `{ worker: 2 }`. Messages are
   * prefixed `[worker=2]`; JSONL event records gain the bindings as fields.
   */
  child(bindings: Record<string, unknown>): Logger;
}

/** `silent` drops everything. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
