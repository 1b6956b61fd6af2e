// packages/core/src/config/defaults.ts

import type { BuildstatConfig } from '../types/config.js';
import { DEFAULT_IO_CONCURRENCY } from '../utils/constants.js';

/** Matches the web test steps, including shard and retry suffixes. */
export const DEFAULT_TEST_STEP_PATTERN =
  String.raw`[\w_-]*(webdriver|blink_(web|wpt))_tests.*\(with patch\)[^|]*`;

export const DEFAULT_SUMMARY_LOG_NAME = 'chromium_swarming.summary';

export const DEFAULT_CONFIG: BuildstatConfig = {
  buildbucket: {
    host: 'cr-buildbucket.appspot.com',
    project: 'chromium',
  },
  gerrit: {
    host: 'chromium-review.googlesource.com',
    project: 'chromium/src',
  },
  resolver: {
    triggerJobs: true,
    onMissingTryBuilds: 'fail',
    ioConcurrency: DEFAULT_IO_CONCURRENCY,
  },
  classifier: {
    testStepPattern: DEFAULT_TEST_STEP_PATTERN,
    summaryLogName: DEFAULT_SUMMARY_LOG_NAME,
  },
  advanced: {
    logLevel: 'info',
  },
};
