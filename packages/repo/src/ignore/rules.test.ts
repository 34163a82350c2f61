import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ConfigError, type Logger } from '@treedump/shared';
import { loadIgnoreRules, parseIgnoreRules, withBuiltinRules, VCS_RULE } from './rules';

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

describe('parseIgnoreRules', () => {
  it('skips blank lines and comments and trims patterns', () => {
    const text = '# deps\nnode_modules/\n\n   *.log  \r\n#dist/\nbuild/\n';
    expect(parseIgnoreRules(text)).toEqual(['node_modules/', '*.log', 'build/']);
  });

  it('returns an empty list for empty text', () => {
    expect(parseIgnoreRules('')).toEqual([]);
  });
});

describe('withBuiltinRules', () => {
  it('appends the version-control rule last', () => {
    expect(withBuiltinRules(['a', 'b/'])).toEqual(['a', 'b/', '.git/']);
    expect(VCS_RULE).toBe('.git/');
  });
});

describe('loadIgnoreRules', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'treedump-rules-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('loads rules and appends .git/', async () => {
    const rulesPath = path.join(tmpDir, '.gitignore');
    await fs.writeFile(rulesPath, 'build/\n*.tmp\n');

    const loaded = await loadIgnoreRules(rulesPath);

    expect(loaded).toEqual({ path: rulesPath, found: true, rules: ['build/', '*.tmp', '.git/'] });
  });

  it('degrades to the built-in rules when the file is missing', async () => {
    const logger = createMockLogger();
    const rulesPath = path.join(tmpDir, 'missing');

    const loaded = await loadIgnoreRules(rulesPath, { logger });

    expect(loaded).toEqual({ path: rulesPath, found: false, rules: ['.git/'] });
    expect(logger.debug).toHaveBeenCalledWith(
      `No ignore rules at ${rulesPath}; using built-in rules only.`,
    );
  });

  it('warns and degrades when the source is not a readable file', async () => {
    const logger = createMockLogger();

    const loaded = await loadIgnoreRules(tmpDir, { logger });

    expect(loaded.found).toBe(false);
    expect(loaded.rules).toEqual(['.git/']);
    expect(logger.warn).toHaveBeenCalledWith(
      `Ignoring unreadable rules file ${tmpDir} (EISDIR).`,
    );
  });

  it('throws a ConfigError when the file is required but missing', async () => {
    const rulesPath = path.join(tmpDir, 'missing');

    await expect(loadIgnoreRules(rulesPath, { required: true })).rejects.toBeInstanceOf(
      ConfigError,
    );
    await expect(loadIgnoreRules(rulesPath, { required: true })).rejects.toThrow(
      `Ignore rules file could not be read: ${rulesPath}`,
    );
  });

  it('uses an injected reader', async () => {
    const readFile = vi.fn().mockResolvedValue('vendor/\n');
    const loaded = await loadIgnoreRules('/virtual/.gitignore', { readFile });
    expect(readFile).toHaveBeenCalledWith('/virtual/.gitignore', 'utf8');
    expect(loaded.rules).toEqual(['vendor/', '.git/']);
  });
});
