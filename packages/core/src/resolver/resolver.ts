// packages/core/src/resolver/resolver.ts — Turn requested builds into classified statuses

import type { BuildbucketClient } from '../buildbucket/client.js';
import type { RawBuild } from '../buildbucket/schema.js';
import { formatBuild, fromRawBuild } from '../builds/identifier.js';
import { BuildStatusMap } from '../builds/status-map.js';
import type { BuildStatusEntry } from '../builds/status-map.js';
import type { BuildIdentifier, BuildbucketStatus } from '../types/build.js';
import { TRY_BUCKET } from '../types/build.js';
import type { TryJobStatus } from '../types/status.js';
import { CI_SEARCH_LIMIT } from '../utils/constants.js';
import { UnresolvedBuildError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import type { WorkerPool } from '../utils/pool.js';
import { sequentialPool } from '../utils/pool.js';
import type { InterruptionClassifier } from './classifier.js';
import { logBuilds } from './report.js';
import type { TryJobInference } from './try-jobs.js';

export interface BuildResolverOptions {
  buildbucket: BuildbucketClient;
  tryJobs: TryJobInference;
  classifier: InterruptionClassifier;
  /** Runs shard summary fetches. Sequential when omitted. */
  pool?: WorkerPool;
  logger?: Logger;
}

const LATEST_CI_STATUS: BuildbucketStatus = 'FAILURE';

function numberedKey(build: BuildIdentifier): string {
  return `${build.builderName}:${build.buildNumber ?? '--'}`;
}

/** Resolve builder names, maybe with build numbers, into statuses. */
export class BuildResolver {
  private readonly buildbucket: BuildbucketClient;
  private readonly tryJobs: TryJobInference;
  private readonly classifier: InterruptionClassifier;
  private readonly pool: WorkerPool;
  private readonly logger: Logger;

  constructor(options: BuildResolverOptions) {
    this.buildbucket = options.buildbucket;
    this.tryJobs = options.tryJobs;
    this.classifier = options.classifier;
    this.pool = options.pool ?? sequentialPool;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Builds without a number are inferred: try builders from the change's
   * build on `patchset` (triggering one if allowed), CI builders from their
   * latest failing build. Several builds of one builder may be requested.
   *
   * @throws UnresolvedBuildError when a try build was triggered by this call
   *   (re-run once it finishes) or try builds cannot be inferred.
   */
  async resolveBuilds(builds: Iterable<BuildIdentifier>, patchset?: number): Promise<BuildStatusMap> {
    const batch = this.buildbucket.newBatch();
    const tryBuildersToInfer = new Set<string>();

    for (const build of builds) {
      if (build.buildNumber !== undefined || build.buildId !== undefined) {
        batch.addGetBuild(build);
      } else if (build.bucket === TRY_BUCKET) {
        tryBuildersToInfer.add(build.builderName);
      } else {
        batch.addSearchBuilds(
          {
            builder: this.buildbucket.builderId(build.bucket, build.builderName),
            status: LATEST_CI_STATUS,
          },
          { limit: CI_SEARCH_LIMIT },
        );
      }
    }

    const statuses = new BuildStatusMap();
    // Completed try builds are fetched again with the full field mask; until
    // that answer arrives their inferred status is only a fallback. Keyed by
    // builder and number since the inferred identifier may lack the build id.
    const refetched = new Map<string, BuildStatusEntry>();
    // Inferred try jobs go first since they have more ways to fail.
    if (tryBuildersToInfer.size > 0) {
      const tryStatuses = await this.tryJobs.fetchOrTriggerTryJobs(tryBuildersToInfer, patchset);
      for (const { build, status } of tryStatuses) {
        if (build.buildNumber !== undefined && status.status === 'COMPLETED') {
          batch.addGetBuild(build);
          refetched.set(numberedKey(build), { build, status });
        } else {
          statuses.set(build, status);
        }
      }
    }

    const classified = await this.classifyAll(await batch.execute());
    statuses.merge(classified);
    for (const { build } of classified) {
      refetched.delete(numberedKey(build));
    }
    for (const { build, status } of refetched.values()) {
      this.logger.debug(`Keeping inferred status for ${formatBuild(build)}`);
      statuses.set(build, status);
    }

    if (statuses.size > 0) {
      logBuilds(statuses, this.logger);
    }
    if (statuses.some((status) => status.status === 'TRIGGERED')) {
      throw new UnresolvedBuildError(
        'Once all pending try jobs have finished, please re-run the tool to fetch new results.',
        statuses,
      );
    }
    return statuses;
  }

  private async classifyAll(rawBuilds: readonly RawBuild[]): Promise<BuildStatusMap> {
    const classified: TryJobStatus[] = await this.pool.map(rawBuilds, (raw) => this.classifier.classify(raw));
    return new BuildStatusMap(rawBuilds.map((raw, index) => [fromRawBuild(raw), classified[index]] as const));
  }
}
