import { Command } from 'commander';
import { ConfigLoader, checkPaths } from '@treedump/core';
import { OutputRenderer } from '../output/renderer';
import type { GlobalOptions } from '../types';
import { collect, toConfigFlags, type DumpCommandOptions } from './dump';

type CheckCommandOptions = Pick<DumpCommandOptions, 'rules' | 'excludeDir' | 'maxDepth'> & {
  root: string;
};

export function registerCheckCommand(program: Command) {
  program
    .command('check')
    .argument('<paths...>', 'Paths to explain, relative to root')
    .description('Explain how a dump would treat each path, and which rule decides it')
    .option('-r, --root <dir>', 'Root the paths are relative to', '.')
    .option('--rules <file>', 'Ignore rules file, relative to root')
    .option('--exclude-dir <name>', 'Directory name never to enter (repeatable)', collect)
    .option('-d, --max-depth <n>', 'Depth limit to apply')
    .action(async (paths: string[], options: CheckCommandOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);

      const config = ConfigLoader.load({
        configPath: globalOpts.config,
        cwd: options.root,
        flags: toConfigFlags(options),
      });

      const outcome = await checkPaths({ root: options.root, config, paths });
      renderer.renderCheck(outcome);
    });
}
