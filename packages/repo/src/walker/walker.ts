import path from 'node:path';
import { randomUUID } from 'node:crypto';
import {
  SilentLogger,
  WalkError,
  describeFault,
  eventMeta,
  relativeInside,
  type Logger,
} from '@treedump/shared';
import { Classifier } from '../classify/classifier';
import { OPAQUE_PLACEHOLDER, readText } from '../content/reader';
import { VCS_DIRECTORY, VCS_RULE } from '../ignore/rules';
import { nodeWalkFs } from './nodeFs';
import type {
  DirentLike,
  Entry,
  WalkFs,
  WalkOptions,
  WalkResult,
  WalkStats,
  WalkerDeps,
} from './types';

type ChildKind = 'directory' | 'linked-directory' | 'file' | 'other';

interface Child {
  name: string;
  kind: ChildKind;
}

function byName(a: DirentLike, b: DirentLike): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

function childPath(relativeDir: string, name: string): string {
  return relativeDir ? `${relativeDir}/${name}` : name;
}

/**
 * Depth-first, depth-bounded traversal that classifies every path it meets
 * and collects the surviving entries in a deterministic order.
 */
export class TreeWalker {
  private readonly fs: WalkFs;
  private readonly logger: Logger;

  constructor(deps: WalkerDeps = {}) {
    this.fs = deps.fs ?? nodeWalkFs;
    this.logger = deps.logger ?? new SilentLogger();
  }

  async walk(root: string, options: WalkOptions = {}): Promise<WalkResult> {
    const rootPath = path.resolve(root);
    const runId = options.runId ?? randomUUID();
    const maxDepth = options.maxDepth ?? Number.POSITIVE_INFINITY;
    const decodeErrors = options.decodeErrors ?? 'replace';

    const selfPaths: string[] = [];
    for (const own of [options.outputPath, options.logPath]) {
      const rel = own ? relativeInside(rootPath, own) : undefined;
      if (rel) selfPaths.push(rel);
    }

    const classifier = new Classifier({
      rules: options.rules ?? [VCS_RULE],
      selfPaths,
      opaque: options.opaque,
    });
    const alwaysExcluded = new Set([VCS_DIRECTORY, ...(options.excludeDirs ?? [])]);

    const entries: Entry[] = [];
    const warnings: string[] = [];
    const stats: WalkStats = {
      directories: 0,
      textFiles: 0,
      opaqueFiles: 0,
      readErrors: 0,
      decodeErrors: 0,
      skippedDirectories: 0,
    };

    const visit = async (absDir: string, relativeDir: string, depth: number): Promise<void> => {
      if (depth > maxDepth) return;

      let dirents: DirentLike[];
      try {
        dirents = await this.fs.readdir(absDir);
      } catch (error) {
        const reason = describeFault(error);
        if (depth === 0) {
          throw new WalkError(`Cannot list traversal root ${rootPath}`, {
            cause: error,
            details: { root: rootPath, reason },
          });
        }
        warnings.push(`Cannot list directory ${relativeDir} (${reason}); subtree skipped.`);
        stats.skippedDirectories++;
        await this.logger.log({
          ...eventMeta(runId),
          type: 'DirectorySkipped',
          payload: { relativePath: relativeDir, reason },
        });
        await this.logger.warn(`Skipping unreadable directory ${relativeDir} (${reason})`);
        return;
      }

      const children: Child[] = [];
      for (const dirent of [...dirents].sort(byName)) {
        children.push({
          name: dirent.name,
          kind: await this.resolveKind(dirent, path.join(absDir, dirent.name)),
        });
      }

      // Drop always-excluded names before anything looks at their subtree.
      const subdirs = children.filter(
        (c) =>
          (c.kind === 'directory' || c.kind === 'linked-directory') && !alwaysExcluded.has(c.name),
      );
      const files = children.filter((c) => c.kind === 'file');

      if (depth + 1 <= maxDepth) {
        for (const dir of subdirs) {
          const rel = childPath(relativeDir, dir.name);
          if (classifier.classify(rel, 'directory') === 'ignored') continue;

          entries.push({ kind: 'directory', relativePath: rel });
          stats.directories++;
          // Links to directories are listed but not followed.
          if (dir.kind === 'directory') {
            await visit(path.join(absDir, dir.name), rel, depth + 1);
          }
        }
      }

      for (const file of files) {
        const rel = childPath(relativeDir, file.name);
        const classification = classifier.classify(rel, 'file');

        if (classification === 'ignored') continue;

        if (classification === 'opaque-file') {
          entries.push({
            kind: 'file',
            relativePath: rel,
            content: OPAQUE_PLACEHOLDER,
            contentStatus: 'opaque',
          });
          stats.opaqueFiles++;
          continue;
        }

        const { content, status, reason } = await readText(path.join(absDir, file.name), {
          decodeErrors,
          readFile: (p) => this.fs.readFile(p),
        });
        entries.push({ kind: 'file', relativePath: rel, content, contentStatus: status });

        if (status === 'text') {
          stats.textFiles++;
        } else if (status === 'decode-error') {
          stats.decodeErrors++;
        } else if (status === 'read-error') {
          stats.readErrors++;
          await this.logger.log({
            ...eventMeta(runId),
            type: 'FileReadFailed',
            payload: { relativePath: rel, reason: reason ?? content },
          });
          await this.logger.warn(`Could not read ${rel} (${reason ?? content})`);
        }
      }
    };

    await visit(rootPath, '', 0);

    return { root: rootPath, entries, warnings, stats };
  }

  private async resolveKind(dirent: DirentLike, absPath: string): Promise<ChildKind> {
    if (dirent.isDirectory()) return 'directory';
    if (dirent.isFile()) return 'file';
    if (!dirent.isSymbolicLink()) return 'other';

    try {
      const target = await this.fs.stat(absPath);
      if (target.isDirectory()) return 'linked-directory';
      if (target.isFile()) return 'file';
      return 'other';
    } catch {
      // Dangling link: listed as a file whose read fails.
      return 'file';
    }
  }
}

/**
 * Functional form of {@link TreeWalker.walk}.
 */
export function walk(
  root: string,
  options: WalkOptions & WalkerDeps = {},
): Promise<WalkResult> {
  const { fs, logger, ...walkOptions } = options;
  return new TreeWalker({ fs, logger }).walk(root, walkOptions);
}
