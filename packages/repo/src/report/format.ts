const DIRECTORY_BAR = '#'.repeat(10);
const FILE_BAR = '-'.repeat(10);

export const CONTENT_OPEN = '<<< content';

const HEADER_ESCAPES: Record<string, string> = { '\\': '\\\\', '\n': '\\n', '\r': '\\r' };
const HEADER_UNESCAPES: Record<string, string> = { '\\': '\\', n: '\n', r: '\r' };

/**
 * Keeps a header on one line: `\`, LF and CR in a path are written as `\\`, `\n` and `\r`.
 */
export function escapeHeaderPath(relativePath: string): string {
  return relativePath.replace(/[\\\n\r]/g, (ch) => HEADER_ESCAPES[ch] ?? ch);
}

export function unescapeHeaderPath(escaped: string): string {
  return escaped.replace(/\\([\\nr])/g, (seq: string, ch: string) => HEADER_UNESCAPES[ch] ?? seq);
}

export function directoryHeader(relativePath: string): string {
  return `${DIRECTORY_BAR} Directory: ${escapeHeaderPath(relativePath)} ${DIRECTORY_BAR}`;
}

export function fileHeader(relativePath: string): string {
  return `${FILE_BAR} File: ${escapeHeaderPath(relativePath)} ${FILE_BAR}`;
}

export function contentClose(relativePath: string): string {
  return `>>> end of ${escapeHeaderPath(relativePath)}`;
}

export const DIRECTORY_HEADER_PATTERN = /^#{10} Directory: (.+) #{10}$/;
export const FILE_HEADER_PATTERN = /^-{10} File: (.+) -{10}$/;
