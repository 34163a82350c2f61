import { ReportError, atomicWrite } from '@treedump/shared';
import type { Entry } from '../walker/types';
import { CONTENT_OPEN, contentClose, directoryHeader, fileHeader } from './format';

export function renderEntry(entry: Entry): string {
  if (entry.kind === 'directory') {
    return `${directoryHeader(entry.relativePath)}\n`;
  }
  const body =
    entry.content === '' || entry.content.endsWith('\n') ? entry.content : `${entry.content}\n`;
  return (
    `${fileHeader(entry.relativePath)}\n` +
    `${CONTENT_OPEN}\n` +
    body +
    `${contentClose(entry.relativePath)}\n\n`
  );
}

/**
 * Serializes entries in order. Identical entries always give identical bytes.
 */
export function renderReport(entries: readonly Entry[]): string {
  return entries.map(renderEntry).join('');
}

export interface WrittenReport {
  path: string;
  bytes: number;
}

export async function writeReport(
  outputPath: string,
  entries: readonly Entry[],
): Promise<WrittenReport> {
  const text = renderReport(entries);
  try {
    await atomicWrite(outputPath, text);
  } catch (error) {
    throw new ReportError(`Failed to write report to ${outputPath}`, {
      cause: error,
      details: { outputPath },
    });
  }
  return { path: outputPath, bytes: Buffer.byteLength(text, 'utf8') };
}
