import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { DumpConfigSchema, UsageError, type DumpConfigInput } from '@treedump/shared';
import { checkPaths } from './service';

describe('checkPaths', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'treedump-check-test-'));
    await fs.mkdir(path.join(tmpDir, 'src', 'lib'), { recursive: true });
    await fs.writeFile(path.join(tmpDir, '.gitignore'), '# build output\ndist/\n*.tmp\ncache\n');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  const run = (paths: string[], input: DumpConfigInput = {}) =>
    checkPaths({ root: tmpDir, config: DumpConfigSchema.parse(input), paths });

  it('classifies text, opaque and directory paths', async () => {
    const outcome = await run(['src/main.ts', 'logo.png', 'src/lib']);

    expect(outcome.rulesFound).toBe(true);
    expect(outcome.checks).toEqual([
      { path: 'src/main.ts', kind: 'file', classification: 'text-file', reason: undefined },
      {
        path: 'logo.png',
        kind: 'file',
        classification: 'opaque-file',
        reason: { type: 'opaque', by: 'extension' },
      },
      { path: 'src/lib', kind: 'directory', classification: 'directory' },
    ]);
  });

  it('names the rule that ignores a path', async () => {
    const outcome = await run(['notes.tmp', 'packages/a/dist/index.js']);

    expect(outcome.checks[0]).toEqual({
      path: 'notes.tmp',
      kind: 'file',
      classification: 'ignored',
      reason: { type: 'rule', rule: '*.tmp' },
    });
    expect(outcome.checks[1]).toEqual({
      path: 'packages/a/dist/index.js',
      kind: 'file',
      classification: 'ignored',
      reason: { type: 'rule', rule: 'dist/' },
      via: 'packages/a/dist',
    });
  });

  it('reports a file hidden by a pruned ancestor directory', async () => {
    // `cache` matches only the whole path "cache", so the file itself is not matched.
    const outcome = await run(['cache/', 'cache/entry.json']);

    expect(outcome.checks).toEqual([
      {
        path: 'cache',
        kind: 'directory',
        classification: 'ignored',
        reason: { type: 'rule', rule: 'cache' },
        via: undefined,
      },
      {
        path: 'cache/entry.json',
        kind: 'file',
        classification: 'ignored',
        reason: { type: 'rule', rule: 'cache' },
        via: 'cache',
      },
    ]);
  });

  it('reports always-excluded directories and the depth limit', async () => {
    const outcome = await run(['.git/HEAD', 'vendor/x.js', 'src/lib/deep.ts', 'src/top.ts'], {
      excludeDirs: ['vendor'],
      maxDepth: 1,
    });

    expect(outcome.checks.map((c) => [c.path, c.classification, c.reason?.type, c.via])).toEqual([
      ['.git/HEAD', 'ignored', 'excluded-directory', '.git'],
      ['vendor/x.js', 'ignored', 'excluded-directory', 'vendor'],
      ['src/lib/deep.ts', 'ignored', 'depth', 'src/lib'],
      ['src/top.ts', 'text-file', undefined, undefined],
    ]);
  });

  it('marks the report file as own output', async () => {
    const outcome = await run(['project_structure.txt']);

    expect(outcome.checks[0].reason).toEqual({
      type: 'own-output',
      path: 'project_structure.txt',
    });
  });

  it('rejects paths outside the root', async () => {
    await expect(run(['../elsewhere.txt'])).rejects.toBeInstanceOf(UsageError);
  });
});
