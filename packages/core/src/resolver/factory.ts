// packages/core/src/resolver/factory.ts — Wire a resolver from configuration

import { BuildbucketClient } from '../buildbucket/client.js';
import type { CodeReview } from '../review/types.js';
import { GitClCodeReview } from '../review/git-cl.js';
import type { GitRunner } from '../review/git-cl.js';
import type { BuildstatConfig } from '../types/config.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { createWorkerPool } from '../utils/pool.js';
import { InterruptionClassifier } from './classifier.js';
import { BuildResolver } from './resolver.js';
import { createJsonFetcher } from './summary.js';
import type { JsonFetcher } from './summary.js';
import { TryJobInference } from './try-jobs.js';

export interface CreateResolverOptions {
  logger?: Logger;
  fetch?: typeof fetch;
  /** Replaces the git runner used to find the current change. */
  git?: GitRunner;
  /** Replaces the git/Buildbucket code review adapter entirely. */
  codeReview?: CodeReview;
  fetchJson?: JsonFetcher;
}

export function createResolver(config: BuildstatConfig, options: CreateResolverOptions = {}): BuildResolver {
  const logger = options.logger ?? silentLogger;
  const buildbucket = new BuildbucketClient({
    host: config.buildbucket.host,
    project: config.buildbucket.project,
    logger,
    ...(options.fetch ? { fetch: options.fetch } : {}),
  });
  const codeReview =
    options.codeReview ??
    new GitClCodeReview({
      buildbucket,
      gerritHost: config.gerrit.host,
      gerritProject: config.gerrit.project,
      logger,
      ...(options.git ? { git: options.git } : {}),
    });

  return new BuildResolver({
    buildbucket,
    tryJobs: new TryJobInference({
      codeReview,
      canTriggerJobs: config.resolver.triggerJobs,
      onMissingTryBuilds: config.resolver.onMissingTryBuilds,
      logger,
    }),
    classifier: new InterruptionClassifier({
      fetchJson: options.fetchJson ?? createJsonFetcher(options.fetch),
      testStepPattern: config.classifier.testStepPattern,
      summaryLogName: config.classifier.summaryLogName,
      logger,
    }),
    pool: createWorkerPool(config.resolver.ioConcurrency),
    logger,
  });
}
