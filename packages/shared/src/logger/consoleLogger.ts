import type { DumpEvent } from '../types/events';
import { formatBindings, type Logger } from './types';

export interface ConsoleLoggerOptions {
  /** Print debug messages and raw events. Off by default. */
  verbose?: boolean;
}

export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
  }

  log(event: DumpEvent): void {
    if (this.verbose) {
      console.debug(JSON.stringify(event));
    }
  }

  trace(event: DumpEvent, message: string): void {
    if (this.verbose) {
      console.debug(message, JSON.stringify(event));
    } else {
      console.info(message);
    }
  }

  debug(message: string): void {
    if (this.verbose) {
      console.debug(message);
    }
  }

  info(message: string): void {
    console.info(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }
}

export class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: DumpEvent) {
    return this.base.log(event);
  }

  trace(event: DumpEvent, message: string) {
    return this.base.trace(event, formatBindings(this.bindings, message));
  }

  debug(message: string) {
    return this.base.debug(formatBindings(this.bindings, message));
  }

  info(message: string) {
    return this.base.info(formatBindings(this.bindings, message));
  }

  warn(message: string) {
    return this.base.warn(formatBindings(this.bindings, message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? formatBindings(this.bindings, message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }
}

/**
 * Discards everything. Default for library callers that pass no logger.
 */
export class SilentLogger implements Logger {
  log(_event: DumpEvent): void {}
  trace(_event: DumpEvent, _message: string): void {}
  debug(_message: string): void {}
  info(_message: string): void {}
  warn(_message: string): void {}
  error(_error: Error, _message?: string): void {}
  child(_bindings: Record<string, unknown>): Logger {
    return this;
  }
}
