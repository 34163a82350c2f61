import fs from 'node:fs/promises';
import path from 'node:path';
import { ReportError, UsageError, describeFault } from '@treedump/shared';
import { parseReport, type ContentStatus, type Entry } from '@treedump/repo';

export interface ReportSummary {
  reportPath: string;
  entries: Entry[];
  directories: number;
  files: Record<ContentStatus, number>;
}

export function summarizeEntries(reportPath: string, entries: Entry[]): ReportSummary {
  const files: Record<ContentStatus, number> = {
    text: 0,
    opaque: 0,
    'decode-error': 0,
    'read-error': 0,
  };
  let directories = 0;
  for (const entry of entries) {
    if (entry.kind === 'directory') {
      directories++;
    } else {
      files[entry.contentStatus]++;
    }
  }
  return { reportPath, entries, directories, files };
}

/**
 * Reads and parses a report written by a previous dump.
 */
export async function inspectReport(reportPath: string): Promise<ReportSummary> {
  const resolved = path.resolve(reportPath);
  let text: string;
  try {
    text = await fs.readFile(resolved, 'utf8');
  } catch (error) {
    const reason = describeFault(error);
    if (reason === 'ENOENT') {
      throw new UsageError(`Report not found: ${resolved}`, { cause: error });
    }
    throw new ReportError(`Cannot read report ${resolved} (${reason})`, { cause: error });
  }
  return summarizeEntries(resolved, parseReport(text));
}
