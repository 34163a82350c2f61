import fs from 'node:fs/promises';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import {
  SilentLogger,
  UsageError,
  describeFault,
  eventMeta,
  type Logger,
} from '@treedump/shared';
import { TreeWalker, loadIgnoreRules, writeReport, type WalkFs } from '@treedump/repo';
import type { DumpOutcome, DumpRequest } from './types';

/**
 * Throws a UsageError unless `root` exists and is a directory.
 */
export async function assertDirectory(root: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(root)).isDirectory();
  } catch (error) {
    throw new UsageError(`Root directory does not exist: ${root}`, {
      cause: error,
      details: { root, reason: describeFault(error) },
    });
  }
  if (!isDirectory) {
    throw new UsageError(`Root is not a directory: ${root}`, { details: { root } });
  }
}

/**
 * Runs one dump end to end: load rules, walk, write the report.
 */
export class DumpService {
  private readonly logger: Logger;
  private readonly walkFs?: WalkFs;

  constructor(logger: Logger = new SilentLogger(), walkFs?: WalkFs) {
    this.logger = logger;
    this.walkFs = walkFs;
  }

  async run(request: DumpRequest): Promise<DumpOutcome> {
    const startTime = Date.now();
    const runId = request.runId ?? randomUUID();
    const { config } = request;
    const root = path.resolve(request.root);

    await assertDirectory(root);

    const outputPath = path.resolve(root, config.outputFile);
    const logPath = config.logFile ? path.resolve(root, config.logFile) : undefined;

    await this.logger.log({
      ...eventMeta(runId),
      type: 'DumpStarted',
      payload: { root, outputPath, maxDepth: config.maxDepth ?? null },
    });

    // 1. Rules
    const rules = await loadIgnoreRules(path.resolve(root, config.rulesFile), {
      required: config.requireRules,
      logger: this.logger,
    });
    await this.logger.log({
      ...eventMeta(runId),
      type: 'RulesLoaded',
      payload: { rulesPath: rules.path, found: rules.found, ruleCount: rules.rules.length },
    });

    // 2. Walk
    const walker = new TreeWalker({ fs: this.walkFs, logger: this.logger.child({ runId }) });
    const result = await walker.walk(root, {
      rules: rules.rules,
      maxDepth: config.maxDepth,
      outputPath,
      logPath,
      excludeDirs: config.excludeDirs,
      opaque: config.opaque,
      decodeErrors: config.decodeErrors,
      runId,
    });
    await this.logger.trace(
      {
        ...eventMeta(runId),
        type: 'WalkFinished',
        payload: {
          entryCount: result.entries.length,
          ...result.stats,
          durationMs: Date.now() - startTime,
        },
      },
      `Collected ${result.entries.length} entries from ${root}`,
    );

    // 3. Report
    let written: DumpOutcome['written'];
    if (!request.dryRun) {
      written = await writeReport(outputPath, result.entries);
      await this.logger.log({
        ...eventMeta(runId),
        type: 'ReportWritten',
        payload: { outputPath: written.path, bytes: written.bytes },
      });
    }

    return {
      runId,
      root,
      outputPath,
      rules,
      result,
      written,
      durationMs: Date.now() - startTime,
    };
  }
}
