/**
 * Error codes used throughout treedump.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'WalkError'
  | 'ReportError'
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
 * Base error class for all treedump errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('WalkError', 'Cannot list root directory', {
 *   cause: originalError,
 *   details: { root: '/srv/project' }
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
 * Error thrown when configuration is invalid or missing,
 * including a rules file that was required but could not be read.
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
 * Error thrown when the traversal root itself cannot be listed.
 * Faults below the root never surface as this error.
 */
export class WalkError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('WalkError', message, options);
  }
}

/**
 * Error thrown when the report cannot be written.
 */
export class ReportError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ReportError', message, options);
  }
}

/**
 * Error thrown when an existing report cannot be parsed.
 * `details.line` holds the 1-based line number of the offending line.
 */
export class ReportFormatError extends AppError {
  public readonly line: number;

  constructor(message: string, line: number, options: AppErrorOptions = {}) {
    super('ReportError', `${message} (line ${line})`, {
      ...options,
      details: { line },
    });
    this.line = line;
  }
}

/**
 * Extracts a short reason from an unknown thrown value,
 * preferring the Node.js error code (`ENOENT`, `EACCES`, ...).
 */
export function describeFault(error: unknown): string {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
