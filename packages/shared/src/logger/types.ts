import type { DumpEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout treedump.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * logger.log({ ...eventMeta(runId), type: 'RulesLoaded', payload });
 * logger.warn('Cannot list directory src/private (EACCES)');
 *
 * const walkLogger = logger.child({ root: '/srv/project' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured dump event.
   */
  log(event: DumpEvent): MaybePromise<void>;

  /**
   * High-signal event with a human-readable summary.
   */
  trace(event: DumpEvent, message: string): MaybePromise<void>;

  /** Log a debug message (shown only in verbose mode by the console logger) */
  debug(message: string): MaybePromise<void>;
  info(message: string): MaybePromise<void>;
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All messages from the child are prefixed with these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}

export function formatBindings(bindings: Record<string, unknown>, message: string): string {
  const prefix = Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
  return prefix ? `[${prefix}] ${message}` : message;
}
