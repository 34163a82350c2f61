import { Command } from 'commander';
import { inspectReport } from '@treedump/core';
import { OutputRenderer } from '../output/renderer';
import type { GlobalOptions } from '../types';

export function registerInspectCommand(program: Command) {
  program
    .command('inspect')
    .argument('<report>', 'Report file written by a previous dump')
    .description('Parse a report and summarize its entries')
    .option('-l, --list', 'List every entry')
    .action(async (report: string, options: { list?: boolean }) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);

      const summary = await inspectReport(report);
      renderer.renderInspect(summary, !!options.list);
    });
}
