import pc from 'picocolors';
import type { CheckOutcome, CheckReason, DumpOutcome, ReportSummary } from '@treedump/core';
import { printTable } from './index';

const PREVIEW_LIMIT = 20;

function reasonText(reason: CheckReason): string {
  switch (reason.type) {
    case 'rule':
      return `rule "${reason.rule}"`;
    case 'own-output':
      return 'own output file';
    case 'opaque':
      return reason.by === 'extension' ? 'opaque extension' : 'opaque file name';
    case 'excluded-directory':
      return `always-excluded directory "${reason.name}"`;
    case 'depth':
      return `deeper than max depth ${reason.maxDepth}`;
  }
}

export function describeReason(reason: CheckReason | undefined, via?: string): string {
  if (!reason) return '';
  const text = reasonText(reason);
  return via ? `${text} (via ${via})` : text;
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  renderDump(outcome: DumpOutcome): void {
    const { result } = outcome;
    if (this.isJson) {
      console.log(
        JSON.stringify(
          {
            status: 'SUCCESS',
            runId: outcome.runId,
            root: outcome.root,
            outputPath: outcome.outputPath,
            written: outcome.written !== undefined,
            bytes: outcome.written?.bytes,
            rules: {
              path: outcome.rules.path,
              found: outcome.rules.found,
              count: outcome.rules.rules.length,
            },
            entryCount: result.entries.length,
            stats: result.stats,
            warnings: result.warnings,
            durationMs: outcome.durationMs,
          },
          null,
          2,
        ),
      );
      return;
    }

    if (outcome.written) {
      console.log(`\n${pc.green('✅ Project structure has been saved to')} ${outcome.outputPath}`);
    } else {
      console.log(`\n${pc.yellow('Dry run:')} nothing written to ${outcome.outputPath}`);
      const preview = result.entries.slice(0, PREVIEW_LIMIT);
      preview.forEach((e) =>
        console.log(`  ${e.kind === 'directory' ? `${e.relativePath}/` : e.relativePath}`),
      );
      if (result.entries.length > PREVIEW_LIMIT) {
        console.log(`  ... and ${result.entries.length - PREVIEW_LIMIT} more.`);
      }
    }

    const { stats } = result;
    console.log(pc.bold('\nEntries:'));
    console.log(`  ${stats.directories} directories`);
    console.log(`  ${stats.textFiles} text files, ${stats.opaqueFiles} opaque files`);
    if (stats.readErrors > 0 || stats.decodeErrors > 0) {
      console.log(`  ${stats.readErrors} unreadable, ${stats.decodeErrors} undecodable`);
    }
    if (!outcome.rules.found) {
      console.log(pc.gray(`  No rules file at ${outcome.rules.path}; built-in rules only.`));
    }

    if (result.warnings.length > 0) {
      console.log(pc.bold(pc.yellow('\nWarnings:')));
      result.warnings.forEach((w) => console.log(`  - ${w}`));
    }
  }

  renderCheck(outcome: CheckOutcome): void {
    if (this.isJson) {
      console.log(JSON.stringify(outcome, null, 2));
      return;
    }

    printTable(
      outcome.checks.map((c) => ({
        path: c.kind === 'directory' ? `${c.path}/` : c.path,
        classification: c.classification,
        reason: describeReason(c.reason, c.via),
      })),
      { head: ['Path', 'Classification', 'Reason'] },
    );
    if (!outcome.rulesFound) {
      console.log(pc.gray(`No rules file at ${outcome.rulesPath}; built-in rules only.`));
    }
  }

  renderInspect(summary: ReportSummary, listEntries: boolean): void {
    if (this.isJson) {
      console.log(
        JSON.stringify(
          {
            reportPath: summary.reportPath,
            directories: summary.directories,
            files: summary.files,
            entries: listEntries
              ? summary.entries.map((e) =>
                  e.kind === 'directory'
                    ? { kind: e.kind, path: e.relativePath }
                    : { kind: e.kind, path: e.relativePath, status: e.contentStatus },
                )
              : undefined,
          },
          null,
          2,
        ),
      );
      return;
    }

    console.log(pc.bold(`Report: ${summary.reportPath}`));
    printTable(
      [
        { kind: 'directories', count: summary.directories },
        { kind: 'text files', count: summary.files.text },
        { kind: 'opaque files', count: summary.files.opaque },
        { kind: 'decode errors', count: summary.files['decode-error'] },
        { kind: 'read errors', count: summary.files['read-error'] },
      ],
      { head: ['Kind', 'Count'] },
    );

    if (listEntries) {
      for (const e of summary.entries) {
        if (e.kind === 'directory') {
          console.log(`  ${e.relativePath}/`);
        } else {
          const status = e.contentStatus === 'text' ? '' : pc.gray(` [${e.contentStatus}]`);
          console.log(`  ${e.relativePath}${status}`);
        }
      }
    }
  }

  log(message: string): void {
    if (!this.isJson) {
      console.log(pc.gray(message));
    }
  }
}
