import { Command } from 'commander';
import path from 'node:path';
import { ConfigLoader, DumpService, assertDirectory } from '@treedump/core';
import {
  ConsoleLogger,
  DecodeErrorsModeSchema,
  JsonlLogger,
  SilentLogger,
  UsageError,
  ensureDir,
  type DumpConfigInput,
  type Logger,
} from '@treedump/shared';
import { OutputRenderer } from '../output/renderer';
import { promptForRoot } from '../utils/prompt';
import type { GlobalOptions } from '../types';

export interface DumpCommandOptions {
  output?: string;
  maxDepth?: string;
  rules?: string;
  requireRules?: boolean;
  excludeDir?: string[];
  decodeErrors?: string;
  dryRun?: boolean;
  logFile?: string;
}

export function parseMaxDepth(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new UsageError(`Invalid --max-depth "${value}". Must be a non-negative integer.`);
  }
  return Number.parseInt(value, 10);
}

function parseDecodeErrors(value: string) {
  const parsed = DecodeErrorsModeSchema.safeParse(value);
  if (!parsed.success) {
    throw new UsageError(`Invalid --decode-errors "${value}". Must be replace or placeholder.`);
  }
  return parsed.data;
}

export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function toConfigFlags(options: DumpCommandOptions): Partial<DumpConfigInput> {
  return {
    outputFile: options.output,
    rulesFile: options.rules,
    requireRules: options.requireRules ? true : undefined,
    maxDepth: options.maxDepth !== undefined ? parseMaxDepth(options.maxDepth) : undefined,
    excludeDirs: options.excludeDir,
    decodeErrors:
      options.decodeErrors !== undefined ? parseDecodeErrors(options.decodeErrors) : undefined,
    logFile: options.logFile,
  };
}

export function registerDumpCommand(program: Command) {
  program
    .command('dump', { isDefault: true })
    .argument('[root]', 'Directory to dump (prompted for when omitted in a terminal)')
    .description('Write every directory and file under root, with file contents, to one report')
    .option('-o, --output <file>', 'Report file, relative to root')
    .option('-d, --max-depth <n>', 'Do not descend more than n directories below root')
    .option('--rules <file>', 'Ignore rules file, relative to root')
    .option('--require-rules', 'Fail when the ignore rules file cannot be read')
    .option('--exclude-dir <name>', 'Directory name never to enter (repeatable)', collect)
    .option('--decode-errors <mode>', 'Invalid UTF-8 handling: replace or placeholder')
    .option('--dry-run', 'Walk and summarize without writing the report')
    .option('--log-file <path>', 'Append dump events as JSON lines, relative to root')
    .action(async (rootArg: string | undefined, options: DumpCommandOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);

      // Flags are validated before any prompt is shown.
      const flags = toConfigFlags(options);

      const root = path.resolve(
        rootArg ??
          (await promptForRoot(process.cwd(), {
            nonInteractive: globalOpts.nonInteractive || globalOpts.json,
          })),
      );
      await assertDirectory(root);

      const config = ConfigLoader.load({ configPath: globalOpts.config, cwd: root, flags });

      // Under --json, stdout carries the result document only.
      const consoleLogger: Logger = globalOpts.json
        ? new SilentLogger()
        : new ConsoleLogger({ verbose: globalOpts.verbose });
      let logger = consoleLogger;
      if (config.logFile) {
        const logPath = path.resolve(root, config.logFile);
        await ensureDir(logPath);
        logger = new JsonlLogger(logPath, {}, consoleLogger);
      }

      if (globalOpts.verbose) renderer.log(`Dumping ${root}`);

      const outcome = await new DumpService(logger).run({
        root,
        config,
        dryRun: options.dryRun,
      });

      renderer.renderDump(outcome);
    });
}
