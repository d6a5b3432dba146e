import * as fs from 'fs/promises';
import type { PackEvent } from '../types/events';
import type { Logger } from './types';
import { ConsoleLogger, ScopedLogger } from './consoleLogger';

export interface JsonlLoggerOptions {
  /** Receives plain log lines, prefixed with the bindings; events only go to the file */
  delegate?: Logger;
  /** Merged into every event record */
  bindings?: Record<string, unknown>;
}

/**
 * Serializes appends to one file. Shared by a logger and its children so
 * lines land in call order even when workers log concurrently.
 */
export class LineWriter {
  private pending: Promise<void> = Promise.resolve();

  constructor(
    readonly filePath: string,
    private readonly onError: (error: unknown) => Promise<void> | void,
  ) {}

  append(line: string): Promise<void> {
    this.pending = this.pending.then(async () => {
      try {
        await fs.appendFile(this.filePath, line, 'utf8');
      } catch (error) {
        // Logging must not fail the run.
        await this.onError(error);
      }
    });
    return this.pending;
  }

  flush(): Promise<void> {
    return this.pending;
  }
}

export class JsonlLogger implements Logger {
  private readonly writer: LineWriter;
  private readonly bindings: Record<string, unknown>;
  /** Unscoped; children scope it once with their merged bindings */
  private readonly root: Logger;
  private readonly delegate: Logger;

  constructor(filePath: string, options: JsonlLoggerOptions = {}, writer?: LineWriter) {
    this.bindings = options.bindings ?? {};
    const root = options.delegate ?? new ConsoleLogger();
    this.root = root;
    this.delegate = Object.keys(this.bindings).length > 0 ? new ScopedLogger(root, this.bindings) : root;
    this.writer =
      writer ??
      new LineWriter(filePath, (error) =>
        root.warn(
          `Failed to write to log file at ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        ),
      );
  }

  log(event: PackEvent): Promise<void> {
    const record = Object.keys(this.bindings).length > 0 ? { ...event, ...this.bindings } : event;
    return this.writer.append(JSON.stringify(record) + '\n');
  }

  debug(message: string) {
    return this.delegate.debug(message);
  }

  info(message: string) {
    return this.delegate.info(message);
  }

  warn(message: string) {
    return this.delegate.warn(message);
  }

  error(error: Error, message?: string) {
    return this.delegate.error(error, message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(
      this.writer.filePath,
      { delegate: this.root, bindings: { ...this.bindings, ...bindings } },
      this.writer,
    );
  }

  /** Resolves once every queued line has been written. */
  flush(): Promise<void> {
    return this.writer.flush();
  }
}
