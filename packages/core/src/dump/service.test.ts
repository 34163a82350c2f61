import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  ConfigError,
  DumpConfigSchema,
  UsageError,
  type DumpConfigInput,
  type Logger,
} from '@treedump/shared';
import { parseReport, renderReport } from '@treedump/repo';
import { DumpService, assertDirectory } from './service';

function createMockLogger(): Logger {
  const logger: Logger = {
    log: vi.fn(),
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}

describe('DumpService', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'treedump-dump-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function createFiles(files: Record<string, string>) {
    for (const [filePath, content] of Object.entries(files)) {
      const fullPath = path.join(tmpDir, filePath);
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, content);
    }
  }

  const config = (input: DumpConfigInput = {}) => DumpConfigSchema.parse(input);

  it('writes a report honoring .gitignore', async () => {
    await createFiles({
      '.gitignore': 'build/\n',
      'a.txt': 'hello',
      'img.png': 'png',
      'build/x.txt': 'built',
    });

    const outcome = await new DumpService().run({ root: tmpDir, config: config() });

    const report = await fs.readFile(path.join(tmpDir, 'project_structure.txt'), 'utf8');
    expect(parseReport(report)).toEqual([
      { kind: 'file', relativePath: '.gitignore', content: 'build/\n', contentStatus: 'text' },
      { kind: 'file', relativePath: 'a.txt', content: 'hello\n', contentStatus: 'text' },
      {
        kind: 'file',
        relativePath: 'img.png',
        content: 'Content ignored due to file type or rules',
        contentStatus: 'opaque',
      },
    ]);
    expect(outcome.rules.rules).toEqual(['build/', '.git/']);
    expect(outcome.written).toEqual({
      path: path.join(tmpDir, 'project_structure.txt'),
      bytes: Buffer.byteLength(report),
    });
  });

  it('produces a byte-identical report when re-run over its own output', async () => {
    await createFiles({ 'src/main.ts': 'export {};\n', 'README.md': '# hi\n' });
    const service = new DumpService();
    const reportPath = path.join(tmpDir, 'project_structure.txt');

    await service.run({ root: tmpDir, config: config() });
    const first = await fs.readFile(reportPath, 'utf8');
    await service.run({ root: tmpDir, config: config() });
    const second = await fs.readFile(reportPath, 'utf8');

    expect(second).toBe(first);
    expect(first).not.toContain('File: project_structure.txt');
  });

  it('does not write in dry-run mode', async () => {
    await createFiles({ 'a.txt': 'a' });

    const outcome = await new DumpService().run({
      root: tmpDir,
      config: config(),
      dryRun: true,
    });

    expect(outcome.written).toBeUndefined();
    expect(outcome.result.entries.map((e) => e.relativePath)).toEqual(['a.txt']);
    await expect(fs.access(path.join(tmpDir, 'project_structure.txt'))).rejects.toThrow();
  });

  it('resolves output, rules and depth from the config', async () => {
    await createFiles({
      'rules.txt': '*.md\n',
      'notes.md': 'skip',
      'a/b/deep.txt': 'deep',
      'a/top.txt': 'top',
    });

    const outcome = await new DumpService().run({
      root: tmpDir,
      config: config({ rulesFile: 'rules.txt', outputFile: 'out/dump.txt', maxDepth: 1 }),
    });

    const report = await fs.readFile(path.join(tmpDir, 'out', 'dump.txt'), 'utf8');
    expect(report).toBe(renderReport(outcome.result.entries));
    expect(outcome.result.entries.map((e) => e.relativePath)).toEqual([
      'a',
      'a/top.txt',
      'rules.txt',
    ]);
  });

  it('aborts before walking when a required rules file is missing', async () => {
    await createFiles({ 'a.txt': 'a' });

    await expect(
      new DumpService().run({ root: tmpDir, config: config({ requireRules: true }) }),
    ).rejects.toBeInstanceOf(ConfigError);
    await expect(fs.access(path.join(tmpDir, 'project_structure.txt'))).rejects.toThrow();
  });

  it('emits lifecycle events in order', async () => {
    await createFiles({ 'a.txt': 'a' });
    const logger = createMockLogger();

    await new DumpService(logger).run({ root: tmpDir, config: config(), runId: 'run-7' });

    const logged = vi.mocked(logger.log).mock.calls.map(([event]) => event.type);
    expect(logged).toEqual(['DumpStarted', 'RulesLoaded', 'ReportWritten']);
    expect(logger.trace).toHaveBeenCalledWith(
      expect.objectContaining({ type: 'WalkFinished', runId: 'run-7' }),
      `Collected 1 entries from ${path.resolve(tmpDir)}`,
    );
  });

  it('rejects a root that is not a directory', async () => {
    await createFiles({ 'file.txt': 'x' });

    await expect(
      new DumpService().run({ root: path.join(tmpDir, 'file.txt'), config: config() }),
    ).rejects.toBeInstanceOf(UsageError);
  });
});

describe('assertDirectory', () => {
  it('rejects a missing path with a UsageError', async () => {
    await expect(assertDirectory(path.join(os.tmpdir(), 'treedump-does-not-exist'))).rejects.toThrow(
      /Root directory does not exist/,
    );
  });
});
