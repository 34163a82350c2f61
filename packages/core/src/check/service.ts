import fs from 'node:fs/promises';
import path from 'node:path';
import {
  UsageError,
  normalizePath,
  relativeInside,
  segments,
  type DumpConfig,
} from '@treedump/shared';
import {
  Classifier,
  VCS_DIRECTORY,
  loadIgnoreRules,
  type Classification,
  type ClassificationReason,
  type PathKind,
} from '@treedump/repo';
import { assertDirectory } from '../dump/service';

export type CheckReason =
  | ClassificationReason
  | { type: 'excluded-directory'; name: string }
  | { type: 'depth'; maxDepth: number };

export interface PathCheck {
  /** Root-relative, `/`-separated */
  path: string;
  kind: PathKind;
  classification: Classification;
  reason?: CheckReason;
  /** The ancestor directory that decided the outcome, when it was not the path itself */
  via?: string;
}

export interface CheckRequest {
  root: string;
  config: DumpConfig;
  paths: readonly string[];
}

export interface CheckOutcome {
  root: string;
  rulesPath: string;
  rulesFound: boolean;
  checks: PathCheck[];
}

async function detectKind(absPath: string, raw: string): Promise<PathKind> {
  if (/[\\/]$/.test(raw)) return 'directory';
  try {
    return (await fs.stat(absPath)).isDirectory() ? 'directory' : 'file';
  } catch {
    // Paths that do not exist yet are judged as files.
    return 'file';
  }
}

/**
 * Explains, for each path, what a dump of `root` would do with it.
 * Ancestors are checked first: a pruned directory hides everything below it.
 */
export async function checkPaths(request: CheckRequest): Promise<CheckOutcome> {
  const root = path.resolve(request.root);
  await assertDirectory(root);

  const { config } = request;
  const rules = await loadIgnoreRules(path.resolve(root, config.rulesFile), {
    required: config.requireRules,
  });

  const selfPaths: string[] = [];
  for (const own of [config.outputFile, config.logFile]) {
    const rel = own ? relativeInside(root, path.resolve(root, own)) : undefined;
    if (rel) selfPaths.push(rel);
  }
  const classifier = new Classifier({ rules: rules.rules, selfPaths, opaque: config.opaque });
  const alwaysExcluded = new Set([VCS_DIRECTORY, ...config.excludeDirs]);

  const checks: PathCheck[] = [];
  for (const raw of request.paths) {
    const absPath = path.resolve(root, raw);
    const rel = relativeInside(root, absPath);
    if (rel === undefined) {
      throw new UsageError(`Path is not inside the root: ${raw}`, { details: { root, path: raw } });
    }
    const kind = await detectKind(absPath, raw);
    checks.push(explainPath(normalizePath(rel), kind, classifier, alwaysExcluded, config.maxDepth));
  }

  return { root, rulesPath: rules.path, rulesFound: rules.found, checks };
}

function explainPath(
  rel: string,
  kind: PathKind,
  classifier: Classifier,
  alwaysExcluded: ReadonlySet<string>,
  maxDepth: number | undefined,
): PathCheck {
  const parts = segments(rel);
  const dirCount = kind === 'directory' ? parts.length : parts.length - 1;

  for (let i = 0; i < dirCount; i++) {
    const dir = parts.slice(0, i + 1).join('/');
    const via = dir === rel ? undefined : dir;

    if (alwaysExcluded.has(parts[i])) {
      return {
        path: rel,
        kind,
        classification: 'ignored',
        reason: { type: 'excluded-directory', name: parts[i] },
        via,
      };
    }
    if (maxDepth !== undefined && i + 1 > maxDepth) {
      return { path: rel, kind, classification: 'ignored', reason: { type: 'depth', maxDepth }, via };
    }
    const detail = classifier.explain(dir, 'directory');
    if (detail.classification === 'ignored') {
      return { path: rel, kind, classification: 'ignored', reason: detail.reason, via };
    }
  }

  if (kind === 'directory') {
    return { path: rel, kind, classification: 'directory' };
  }
  const detail = classifier.explain(rel, 'file');
  return { path: rel, kind, classification: detail.classification, reason: detail.reason };
}
