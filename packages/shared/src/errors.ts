/**
 * Error codes used throughout codepack.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  | 'SetupError'
  | 'OutputError'
  // Per-file errors, recorded and never fatal
  | 'DiscoveryError'
  | 'ReadError'
  | 'DecodeError'
  | 'SanitizeError'
  | 'CountError'
  // Runtime errors (exit code 1)
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all codepack errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('SetupError', 'Root directory does not exist', {
 *   details: { root: '/tmp/missing' },
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown before any file is processed: bad root, missing ignore file.
 * Aborts the run.
 */
export class SetupError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('SetupError', message, options);
  }
}

/**
 * Error thrown when the output document cannot be written.
 */
export class OutputError extends AppError {
  /** Target path of the document */
  public readonly outputPath: string;

  constructor(outputPath: string, message: string, options: AppErrorOptions = {}) {
    super('OutputError', message, options);
    this.outputPath = outputPath;
  }
}

/**
 * Error raised for a directory entry that could not be listed or stat'ed.
 */
export class DiscoveryError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('DiscoveryError', message, options);
  }
}

/**
 * Error raised when a file's bytes cannot be read.
 */
export class ReadError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ReadError', message, options);
  }
}

/**
 * Error raised when no encoding fallback produced plausible text.
 */
export class DecodeError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('DecodeError', message, options);
  }
}

/**
 * Error raised by a sanitization rule.
 * Points at a configuration problem rather than a data problem.
 */
export class SanitizeError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('SanitizeError', message, options);
  }
}

/**
 * Error raised by the token counting primitive.
 */
export class CountError extends AppError {
  /** Model whose encoding failed */
  public readonly model: string;

  constructor(model: string, message: string, options: AppErrorOptions = {}) {
    super('CountError', message, options);
    this.model = model;
  }
}

/**
 * True for errors the user can fix by changing input or configuration.
 */
export function isUserCorrectable(error: unknown): boolean {
  return (
    error instanceof ConfigError ||
    error instanceof UsageError ||
    error instanceof SetupError ||
    error instanceof OutputError
  );
}

/**
 * Human-readable single-line reason for a failure record.
 */
export function toFailureReason(error: unknown): string {
  if (error instanceof AppError) {
    const cause = error.cause;
    if (cause instanceof Error && cause.message && !error.message.includes(cause.message)) {
      return `${error.message}: ${cause.message}`;
    }
    return error.message;
  }
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return code && !error.message.startsWith(code) ? `${code}: ${error.message}` : error.message;
  }
  return String(error);
}
