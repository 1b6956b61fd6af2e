// packages/cli/src/commands/init.ts — buildstat init

import { existsSync } from 'node:fs';
import { join } from 'node:path';

import { CONFIG_FILENAME, loadConfig, writeConfig } from '@buildstat/core';
import chalk from 'chalk';

import { EXIT_FAILURE } from '../utils.js';

interface InitOptions {
  force?: boolean;
  dir?: string;
}

export async function initCommand(options: InitOptions): Promise<void> {
  const dir = options.dir ?? process.cwd();
  const configPath = join(dir, CONFIG_FILENAME);

  if (existsSync(configPath) && !options.force) {
    console.error(chalk.red(`${CONFIG_FILENAME} already exists. Use --force to overwrite.`));
    process.exitCode = EXIT_FAILURE;
    return;
  }

  const config = loadConfig({ projectDir: dir, skipFile: true });
  writeConfig(config, dir);

  console.log(chalk.green(`Wrote ${configPath}`));
  console.log(chalk.gray(`  Buildbucket: ${config.buildbucket.host} (project ${config.buildbucket.project})`));
  console.log(chalk.gray(`  Gerrit:      ${config.gerrit.host} (${config.gerrit.project})`));
  console.log(chalk.gray('\nNext: buildstat resolve linux-rel'));
}
