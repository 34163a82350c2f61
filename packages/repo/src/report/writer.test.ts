import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ReportError } from '@treedump/shared';
import { renderEntry, renderReport, writeReport } from './writer';
import type { Entry } from '../walker/types';
import { OPAQUE_PLACEHOLDER } from '../content/reader';

const entries: Entry[] = [
  { kind: 'directory', relativePath: 'src' },
  { kind: 'file', relativePath: 'src/a.txt', content: 'hello', contentStatus: 'text' },
  { kind: 'file', relativePath: 'img.png', content: OPAQUE_PLACEHOLDER, contentStatus: 'opaque' },
];

describe('renderEntry', () => {
  it('renders a directory as a single header line', () => {
    expect(renderEntry({ kind: 'directory', relativePath: 'a/b' })).toBe(
      '########## Directory: a/b ##########\n',
    );
  });

  it('renders a file as header, labeled block and closing line', () => {
    expect(
      renderEntry({ kind: 'file', relativePath: 'a.txt', content: 'hello', contentStatus: 'text' }),
    ).toBe(
      '---------- File: a.txt ----------\n<<< content\nhello\n>>> end of a.txt\n\n',
    );
  });

  it('does not double a trailing newline', () => {
    expect(
      renderEntry({ kind: 'file', relativePath: 'a.txt', content: 'x\n', contentStatus: 'text' }),
    ).toBe('---------- File: a.txt ----------\n<<< content\nx\n>>> end of a.txt\n\n');
  });

  it('escapes line breaks and backslashes in paths', () => {
    expect(
      renderEntry({ kind: 'file', relativePath: 'odd\nname\\x.txt', content: 'x\n', contentStatus: 'text' }),
    ).toBe(
      '---------- File: odd\\nname\\\\x.txt ----------\n<<< content\nx\n>>> end of odd\\nname\\\\x.txt\n\n',
    );
  });

  it('renders empty content as an empty block', () => {
    expect(
      renderEntry({ kind: 'file', relativePath: 'e.txt', content: '', contentStatus: 'text' }),
    ).toBe('---------- File: e.txt ----------\n<<< content\n>>> end of e.txt\n\n');
  });
});

describe('renderReport', () => {
  it('concatenates entries in order', () => {
    expect(renderReport(entries)).toBe(
      [
        '########## Directory: src ##########',
        '---------- File: src/a.txt ----------',
        '<<< content',
        'hello',
        '>>> end of src/a.txt',
        '',
        '---------- File: img.png ----------',
        '<<< content',
        'Content ignored due to file type or rules',
        '>>> end of img.png',
        '',
        '',
      ].join('\n'),
    );
  });

  it('renders an empty report for no entries', () => {
    expect(renderReport([])).toBe('');
  });
});

describe('writeReport', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'treedump-writer-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('writes the rendered report and returns its size', async () => {
    const target = path.join(tmpDir, 'out', 'report.txt');

    const written = await writeReport(target, entries);

    const text = await fs.readFile(target, 'utf8');
    expect(text).toBe(renderReport(entries));
    expect(written).toEqual({ path: target, bytes: Buffer.byteLength(text) });
  });

  it('wraps write failures in a ReportError', async () => {
    // The target is an existing directory, so the final rename fails.
    await fs.mkdir(path.join(tmpDir, 'taken'));
    await fs.writeFile(path.join(tmpDir, 'taken', 'child'), 'x');

    await expect(writeReport(path.join(tmpDir, 'taken'), entries)).rejects.toBeInstanceOf(
      ReportError,
    );
  });
});
