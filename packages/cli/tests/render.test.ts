import { BuildStatusMap, INFRA_FAILURE, TRIGGERED, completed, createBuild } from '@buildstat/core';
import type { Logger } from '@buildstat/core';
import chalk from 'chalk';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { printResults, renderStatusTable, withSpinner } from '../src/render.js';

const statuses = new BuildStatusMap([
  [createBuild('mac-rel', { bucket: 'ci', buildNumber: 7 }), INFRA_FAILURE],
  [createBuild('linux-rel', { buildNumber: 100 }), completed('FAILURE')],
  [createBuild('win-rel'), TRIGGERED],
]);

let level: typeof chalk.level;

beforeEach(() => {
  level = chalk.level;
  chalk.level = 0;
});

afterEach(() => {
  chalk.level = level;
  vi.restoreAllMocks();
});

describe('renderStatusTable', () => {
  it('renders the header and one row per build', () => {
    expect(renderStatusTable(statuses)).toEqual([
      '  BUILDER              NUMBER  STATUS    BUCKET',
      '  linux-rel            100     FAILURE   try',
      '  mac-rel              7       INFRA_FAILURE ci',
      '  win-rel              --      TRIGGERED try',
    ]);
  });
});

describe('printResults', () => {
  it('summarizes finished and incomplete builds', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    printResults(statuses);
    const lines = log.mock.calls.map(([line]) => String(line));
    expect(lines).toContain('  Finished:   2/3');
    expect(lines).toContain('  Incomplete: 1 build');
  });
});

describe('withSpinner', () => {
  it('clears the spinner around each log line', () => {
    const calls: string[] = [];
    const spinner = {
      isSpinning: true,
      clear: () => {
        calls.push('clear');
      },
      render: () => {
        calls.push('render');
      },
    };
    const logger: Logger = {
      debug: () => {},
      info: (message) => {
        calls.push(message);
      },
      warn: () => {},
      error: () => {},
    };

    withSpinner(logger, spinner).info('hello');

    expect(calls).toEqual(['clear', 'hello', 'render']);
  });
});
