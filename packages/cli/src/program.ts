// packages/cli/src/program.ts — Command registration

import { VERSION } from '@buildstat/core';
import { Command } from 'commander';

import { initCommand } from './commands/init.js';
import { resolveCommand } from './commands/resolve.js';
import type { ResolveOptions } from './commands/resolve.js';
import { parsePositiveInt } from './parse.js';

export interface ProgramActions {
  resolve: (builds: string[], options: ResolveOptions) => Promise<void>;
  init: (options: { force?: boolean }) => Promise<void>;
}

const defaultActions: ProgramActions = {
  resolve: (builds, options) => resolveCommand(builds, options),
  init: initCommand,
};

export function createProgram(actions: ProgramActions = defaultActions): Command {
  const program = new Command();

  program
    .name('buildstat')
    .description('Resolve builders and build numbers into try job statuses')
    .version(VERSION)
    .option('--verbose', 'Enable debug logging');

  program
    .command('resolve')
    .description('Fetch statuses of builds, inferring try builds from the current change')
    .argument('<builds...>', 'Builds as [bucket/]builder[:number]; bucket defaults to "try"')
    .option('--patchset <n>', 'Patchset to read try builds from (default: latest)', parsePositiveInt('Patchset'))
    .option('--no-trigger', 'Do not trigger try builds that are missing')
    .option('--json', 'Print results as JSON; logs go to stderr')
    .option('--concurrency <n>', 'Concurrent shard summary fetches', parsePositiveInt('Concurrency'))
    .option('--config-dir <dir>', 'Directory containing .buildstat.yml (default: cwd)')
    .action(async (builds: string[], options: ResolveOptions, command: Command) => {
      const globals = command.optsWithGlobals<{ verbose?: boolean }>();
      await actions.resolve(builds, { ...options, verbose: globals.verbose === true });
    });

  program
    .command('init')
    .description('Write a default .buildstat.yml in the current directory')
    .option('--force', 'Overwrite an existing .buildstat.yml', false)
    .action(actions.init);

  return program;
}
