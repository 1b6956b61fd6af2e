// packages/cli/src/render.ts — Terminal rendering of resolved builds

import type { BuildStatusMap, Logger, TryJobStatus } from '@buildstat/core';
import { formatBuildTable, hasIncompleteResults, isFinished, pluralize } from '@buildstat/core';
import chalk from 'chalk';

export function statusColor(status: TryJobStatus): (text: string) => string {
  switch (status.status) {
    case 'COMPLETED':
      return status.result === 'SUCCESS' ? chalk.green : status.result === 'FAILURE' ? chalk.red : chalk.gray;
    case 'INFRA_FAILURE':
      return chalk.magenta;
    case 'SCHEDULED':
    case 'STARTED':
      return chalk.cyan;
    case 'TRIGGERED':
      return chalk.yellow;
    case 'MISSING':
      return chalk.gray;
  }
}

/** The core build table, each row colored by its status. */
export function renderStatusTable(statuses: BuildStatusMap): string[] {
  const [header, ...rows] = formatBuildTable(statuses);
  const entries = statuses.sorted();
  return [chalk.bold(header), ...rows.map((line, i) => statusColor(entries[i].status)(line))];
}

export function printResults(statuses: BuildStatusMap): void {
  console.log(chalk.bold('\nBuild Statuses'));
  console.log(chalk.gray('-'.repeat(40)));
  for (const line of renderStatusTable(statuses)) {
    console.log(line);
  }
  console.log(chalk.gray('-'.repeat(40)));

  const finished = statuses.filter(isFinished).size;
  const incomplete = statuses.filter(hasIncompleteResults).size;
  console.log(`  Finished:   ${chalk.cyan(`${finished}/${statuses.size}`)}`);
  if (incomplete > 0) {
    console.log(`  Incomplete: ${chalk.magenta(pluralize('build', incomplete))}`);
  }
}

/** The part of an ora spinner that log output has to step around. */
export interface Spinner {
  readonly isSpinning: boolean;
  clear(): unknown;
  render(): unknown;
}

/** Keep spinner frames from interleaving with log lines. */
export function withSpinner(logger: Logger, spinner: Spinner): Logger {
  const wrap =
    (write: (message: string, ...args: unknown[]) => void) =>
    (message: string, ...args: unknown[]): void => {
      const spinning = spinner.isSpinning;
      if (spinning) spinner.clear();
      write(message, ...args);
      if (spinning) spinner.render();
    };
  return {
    debug: wrap(logger.debug),
    info: wrap(logger.info),
    warn: wrap(logger.warn),
    error: wrap(logger.error),
  };
}
