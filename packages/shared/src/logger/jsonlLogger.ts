import * as fs from 'fs/promises';
import type { DumpEvent } from '../types/events';
import { ConsoleLogger } from './consoleLogger';
import { formatBindings, type Logger } from './types';

/**
 * Appends every event to a JSONL file and forwards text messages to a console logger.
 */
export class JsonlLogger implements Logger {
  private readonly filePath: string;
  private readonly bindings: Record<string, unknown>;
  private readonly console: Logger;

  constructor(filePath: string, bindings: Record<string, unknown> = {}, console?: Logger) {
    this.filePath = filePath;
    this.bindings = bindings;
    this.console = console ?? new ConsoleLogger();
  }

  async log(event: DumpEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // A broken log file must not fail the dump.
      this.console.error(
        error instanceof Error ? error : new Error(String(error)),
        `Failed to write to log file at ${this.filePath}`,
      );
    }
  }

  async trace(event: DumpEvent, message: string): Promise<void> {
    await this.log(event);
    await this.console.trace(event, formatBindings(this.bindings, message));
  }

  debug(message: string) {
    return this.console.debug(formatBindings(this.bindings, message));
  }

  info(message: string) {
    return this.console.info(formatBindings(this.bindings, message));
  }

  warn(message: string) {
    return this.console.warn(formatBindings(this.bindings, message));
  }

  error(error: Error, message?: string) {
    return this.console.error(error, message ? formatBindings(this.bindings, message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings }, this.console);
  }
}
