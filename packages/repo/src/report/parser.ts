import { ReportFormatError } from '@treedump/shared';
import {
  DECODE_ERROR_PLACEHOLDER,
  OPAQUE_PLACEHOLDER,
  READ_ERROR_PREFIX,
  type ContentStatus,
} from '../content/reader';
import type { Entry } from '../walker/types';
import {
  CONTENT_OPEN,
  DIRECTORY_HEADER_PATTERN,
  FILE_HEADER_PATTERN,
  contentClose,
  unescapeHeaderPath,
} from './format';

function statusOf(content: string): { content: string; status: ContentStatus } {
  // Placeholders are written as a single line.
  const singleLine = content.endsWith('\n') ? content.slice(0, -1) : content;
  if (singleLine === OPAQUE_PLACEHOLDER) {
    return { content: singleLine, status: 'opaque' };
  }
  if (singleLine === DECODE_ERROR_PLACEHOLDER) {
    return { content: singleLine, status: 'decode-error' };
  }
  if (singleLine.startsWith(READ_ERROR_PREFIX) && !singleLine.includes('\n')) {
    return { content: singleLine, status: 'read-error' };
  }
  return { content, status: 'text' };
}

/**
 * Reads back a report written by `renderReport`.
 * Text content comes back newline-terminated.
 */
export function parseReport(text: string): Entry[] {
  const lines = text.split('\n');
  // A trailing newline leaves one empty element behind.
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  const entries: Entry[] = [];
  let i = 0;

  while (i < lines.length) {
    const line = lines[i];
    const lineNo = i + 1;

    if (line === '') {
      i++;
      continue;
    }

    const dirMatch = DIRECTORY_HEADER_PATTERN.exec(line);
    if (dirMatch) {
      entries.push({ kind: 'directory', relativePath: unescapeHeaderPath(dirMatch[1]) });
      i++;
      continue;
    }

    const fileMatch = FILE_HEADER_PATTERN.exec(line);
    if (!fileMatch) {
      throw new ReportFormatError('Unexpected line outside of an entry', lineNo);
    }

    const relativePath = unescapeHeaderPath(fileMatch[1]);
    if (lines[i + 1] !== CONTENT_OPEN) {
      throw new ReportFormatError(`Missing content block for ${relativePath}`, lineNo + 1);
    }

    const close = contentClose(relativePath);
    const body: string[] = [];
    let j = i + 2;
    while (j < lines.length && lines[j] !== close) {
      body.push(lines[j]);
      j++;
    }
    if (j >= lines.length) {
      throw new ReportFormatError(`Unterminated content block for ${relativePath}`, lineNo);
    }

    const raw = body.length > 0 ? `${body.join('\n')}\n` : '';
    const { content, status } = statusOf(raw);
    entries.push({ kind: 'file', relativePath, content, contentStatus: status });
    i = j + 1;
  }

  return entries;
}
