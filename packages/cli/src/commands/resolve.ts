// packages/cli/src/commands/resolve.ts — buildstat resolve

import type { BuildStatusMap, BuildstatConfig, CreateResolverOptions } from '@buildstat/core';
import { UnresolvedBuildError, createLogger, createResolver, loadConfig, pluralize } from '@buildstat/core';
import chalk from 'chalk';
import ora from 'ora';

import { parseBuildSpec } from '../parse.js';
import { printResults, withSpinner } from '../render.js';
import { EXIT_FAILURE, EXIT_UNRESOLVED } from '../utils.js';

export interface ResolveOptions {
  patchset?: number;
  trigger?: boolean;
  json?: boolean;
  concurrency?: number;
  configDir?: string;
  verbose?: boolean;
}

/** Load config with command line flags layered over the config file. */
export function configFromOptions(options: ResolveOptions): BuildstatConfig {
  return loadConfig({
    ...(options.configDir ? { projectDir: options.configDir } : {}),
    overrides: {
      resolver: {
        ...(options.trigger === false ? { triggerJobs: false } : {}),
        ...(options.concurrency !== undefined ? { ioConcurrency: options.concurrency } : {}),
      },
      ...(options.verbose ? { advanced: { logLevel: 'debug' as const } } : {}),
    },
  });
}

function printJson(statuses: BuildStatusMap | undefined, error?: UnresolvedBuildError): void {
  console.log(
    JSON.stringify(
      {
        builds: statuses?.toJSON() ?? [],
        ...(error ? { unresolved: error.reason } : {}),
      },
      null,
      2,
    ),
  );
}

export async function resolveCommand(
  specs: string[],
  options: ResolveOptions,
  deps: CreateResolverOptions = {},
): Promise<void> {
  try {
    const builds = specs.map(parseBuildSpec);
    const config = configFromOptions(options);
    const baseLogger = deps.logger ?? createLogger(config.advanced.logLevel, { stderrOnly: options.json, plain: true });
    const spinner = ora({
      text: `Resolving ${pluralize('build', builds.length)}...`,
      isSilent: options.json === true,
    }).start();
    const logger = withSpinner(baseLogger, spinner);

    let statuses: BuildStatusMap;
    try {
      statuses = await createResolver(config, { ...deps, logger }).resolveBuilds(builds, options.patchset);
      spinner.succeed(`Resolved ${pluralize('build', statuses.size)}`);
    } catch (error) {
      spinner.stop();
      throw error;
    }

    if (options.json) {
      printJson(statuses);
    } else {
      printResults(statuses);
    }
  } catch (error) {
    if (error instanceof UnresolvedBuildError) {
      if (options.json) {
        printJson(error.buildStatuses, error);
      } else {
        if (error.buildStatuses && error.buildStatuses.size > 0) {
          printResults(error.buildStatuses);
        }
        console.error(chalk.yellow(`\n${error.reason}`));
      }
      process.exitCode = EXIT_UNRESOLVED;
      return;
    }
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    process.exitCode = EXIT_FAILURE;
  }
}
