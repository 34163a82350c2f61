import { Command } from 'commander';
import { AppError, ConfigError, UsageError } from '@treedump/shared';
import { version } from '../package.json';
import { registerDumpCommand } from './commands/dump';
import { registerCheckCommand } from './commands/check';
import { registerInspectCommand } from './commands/inspect';
import type { GlobalOptions } from './types';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('treedump')
    .description('Dump a directory tree and its text contents into one report')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .option('--non-interactive', 'Disable interactive prompts');

  registerDumpCommand(program);
  registerCheckCommand(program);
  registerInspectCommand(program);

  return program;
}

/**
 * Prints a failure the way the user asked for it and returns the exit code:
 * 2 for mistakes the user can correct, 1 for everything else.
 */
export function reportError(e: unknown, opts: GlobalOptions): number {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
  } else {
    console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
    if (e instanceof AppError && e.details) {
      console.error(
        `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
      );
    }
    if (opts.verbose && e instanceof Error && e.stack) {
      console.error(`\nStack Trace:\n${e.stack}`);
    } else {
      console.error(`\nFor more details, run with the --verbose flag.`);
    }
  }

  return e instanceof ConfigError || e instanceof UsageError ? 2 : 1;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  try {
    await program.parseAsync(argv);
  } catch (e) {
    process.exit(reportError(e, program.opts<GlobalOptions>()));
  }
}
