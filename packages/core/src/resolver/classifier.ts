// packages/core/src/resolver/classifier.ts — Recode opaque build failures as infra failures

import type { RawBuild, RawStep } from '../buildbucket/schema.js';
import { INFRA_FAILURE, fromBuildbucketStatus } from '../builds/status.js';
import { DEFAULT_SUMMARY_LOG_NAME, DEFAULT_TEST_STEP_PATTERN } from '../config/defaults.js';
import type { TryJobStatus } from '../types/status.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { INFRA_ERROR_EXIT_CODES } from './exit-codes.js';
import type { JsonFetcher } from './summary.js';
import { fetchSwarmingSummary } from './summary.js';

export interface InterruptionClassifierOptions {
  fetchJson: JsonFetcher;
  /** Source of a regular expression that must match a whole step name. */
  testStepPattern?: string;
  summaryLogName?: string;
  logger?: Logger;
}

/**
 * Buildbucket reports FAILURE both for genuine test failures and for builds
 * whose test results are incomplete: compile or merge failures, shards that
 * timed out, harnesses that exited early. Only the first kind is useful to
 * someone reading test results, so the rest are reported as INFRA_FAILURE.
 */
export class InterruptionClassifier {
  private readonly fetchJson: JsonFetcher;
  private readonly testStepPattern: RegExp;
  private readonly summaryLogName: string;
  private readonly logger: Logger;

  constructor(options: InterruptionClassifierOptions) {
    this.fetchJson = options.fetchJson;
    this.testStepPattern = new RegExp(`^(?:${options.testStepPattern ?? DEFAULT_TEST_STEP_PATTERN})$`);
    this.summaryLogName = options.summaryLogName ?? DEFAULT_SUMMARY_LOG_NAME;
    this.logger = options.logger ?? silentLogger;
  }

  isTestStep(stepName: string): boolean {
    return this.testStepPattern.test(stepName);
  }

  async classify(build: RawBuild): Promise<TryJobStatus> {
    // The recipe's failure_type is opaque to Buildbucket; anything other
    // than a test failure means the tests never produced full results.
    const failureType = build.output?.properties?.['failure_type'];
    if (failureType !== undefined && failureType !== null && failureType !== 'TEST_FAILURE') {
      this.logger.debug(`Build ${build.id} failed with failure_type ${String(failureType)}`);
      return INFRA_FAILURE;
    }

    for (const step of build.steps ?? []) {
      if (!this.isTestStep(step.name)) {
        continue;
      }
      if (await this.stepInterrupted(step)) {
        this.logger.debug(`Build ${build.id} has an interrupted shard in "${step.name}"`);
        return INFRA_FAILURE;
      }
    }
    return fromBuildbucketStatus(build.status);
  }

  private async stepInterrupted(step: RawStep): Promise<boolean> {
    const log = (step.logs ?? []).find((candidate) => candidate.name === this.summaryLogName);
    if (!log?.viewUrl) {
      return false;
    }
    const summary = await fetchSwarmingSummary(this.fetchJson, log.viewUrl, this.logger);
    return (summary?.shards ?? []).some(
      (shard) => shard !== null && INFRA_ERROR_EXIT_CODES.has(shard.exit_code),
    );
  }
}
