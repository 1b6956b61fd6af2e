// packages/core/src/resolver/report.ts — Tabular build summaries for the operator log

import { formatBuildNumber } from '../builds/identifier.js';
import { hasIncompleteResults, isFinished, statusLabel } from '../builds/status.js';
import type { BuildStatusMap } from '../builds/status-map.js';
import {
  BUCKET_COLUMN_WIDTH,
  BUILDER_COLUMN_MIN_WIDTH,
  NUMBER_COLUMN_WIDTH,
  STATUS_COLUMN_WIDTH,
} from '../utils/constants.js';
import type { Logger } from '../utils/logger.js';

const INCOMPLETE_RESULTS_HELP = [
  'Examples of incomplete results include:',
  '  * Shard terminated the harness after timing out.',
  '  * Harness exited early due to excessive unexpected failures.',
  '  * Build failed on a non-test step.',
  'Please consider retrying the failed builders or giving the builders more shards.',
];

function row(nameWidth: number, cells: readonly [string, string, string, string]): string {
  const [builder, number, status, bucket] = cells;
  return `  ${builder.padEnd(nameWidth)} ${number.padEnd(NUMBER_COLUMN_WIDTH)} ${status.padEnd(STATUS_COLUMN_WIDTH)} ${bucket.padEnd(BUCKET_COLUMN_WIDTH)}`.trimEnd();
}

/**
 * Render statuses as table lines, header first, sorted by builder then number.
 * The builder column is at least 20 wide so it stays apart from NUMBER.
 */
export function formatBuildTable(statuses: BuildStatusMap): string[] {
  const entries = statuses.sorted();
  const nameWidth = Math.max(
    BUILDER_COLUMN_MIN_WIDTH,
    ...entries.map(({ build }) => build.builderName.length),
  );
  return [
    row(nameWidth, ['BUILDER', 'NUMBER', 'STATUS', 'BUCKET']),
    ...entries.map(({ build, status }) =>
      row(nameWidth, [build.builderName, formatBuildNumber(build), statusLabel(status), build.bucket]),
    ),
  ];
}

export function warnAboutIncompleteResults(statuses: BuildStatusMap, logger: Logger): void {
  const incomplete = statuses.filter(hasIncompleteResults);
  if (incomplete.size === 0) {
    return;
  }
  logger.warn('Some builds have incomplete results:');
  for (const { build } of incomplete.sorted()) {
    logger.warn(`  "${build.builderName}" build ${formatBuildNumber(build)}`);
  }
  for (const line of INCOMPLETE_RESULTS_HELP) {
    logger.warn(line);
  }
}

/** Log which builds finished and which are still scheduled or running. */
export function logBuilds(statuses: BuildStatusMap, logger: Logger): void {
  warnAboutIncompleteResults(statuses, logger);

  const finished = statuses.filter(isFinished);
  if (finished.size === statuses.size) {
    logger.info('All builds finished.');
    return;
  }
  if (finished.size > 0) {
    logger.info('Finished builds:');
    formatBuildTable(finished).forEach((line) => logger.info(line));
  } else {
    logger.info('No finished builds.');
  }

  const unfinished = statuses.filter((status) => !isFinished(status) && status.status !== 'MISSING');
  if (unfinished.size > 0) {
    logger.info('Scheduled or started builds:');
    formatBuildTable(unfinished).forEach((line) => logger.info(line));
  }
}
