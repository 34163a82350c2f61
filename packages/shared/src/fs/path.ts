import path from 'node:path';

/**
 * Normalizes a path to use forward slashes, the form used in every report and rule match.
 *
 * @param p The path to normalize.
 * @returns The normalized path with forward slashes.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * A platform-agnostic version of `path.relative`.
 */
export function relative(from: string, to: string): string {
  return normalizePath(path.relative(from, to));
}

/**
 * Returns `target` relative to `root` when it lies inside `root`, otherwise `undefined`.
 * The root itself yields `undefined` too, as it is never a walk entry.
 */
export function relativeInside(root: string, target: string): string | undefined {
  const rel = relative(path.resolve(root), path.resolve(root, target));
  if (rel === '' || rel === '..' || rel.startsWith('../') || path.isAbsolute(rel)) {
    return undefined;
  }
  return rel;
}

/**
 * Splits a normalized relative path into its non-empty segments.
 */
export function segments(p: string): string[] {
  return normalizePath(p)
    .split('/')
    .filter((s) => s.length > 0);
}
