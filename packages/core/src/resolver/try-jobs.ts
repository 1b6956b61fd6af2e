// packages/core/src/resolver/try-jobs.ts — Find or trigger try builds for the current change

import { createBuild } from '../builds/identifier.js';
import { MISSING, TRIGGERED } from '../builds/status.js';
import { BuildStatusMap } from '../builds/status-map.js';
import type { ClRevision, CodeReview } from '../review/types.js';
import { formatClRevision } from '../review/types.js';
import type { BuildIdentifier } from '../types/build.js';
import { TRY_BUCKET } from '../types/build.js';
import type { MissingTryBuildPolicy } from '../types/config.js';
import type { TryJobStatus } from '../types/status.js';
import { UnresolvedBuildError } from '../utils/errors.js';
import { pluralize } from '../utils/grammar.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';

export interface TryJobInferenceOptions {
  codeReview: CodeReview;
  canTriggerJobs?: boolean;
  onMissingTryBuilds?: MissingTryBuildPolicy;
  logger?: Logger;
}

export class TryJobInference {
  private readonly codeReview: CodeReview;
  private readonly canTriggerJobs: boolean;
  private readonly onMissingTryBuilds: MissingTryBuildPolicy;
  private readonly logger: Logger;

  constructor(options: TryJobInferenceOptions) {
    this.codeReview = options.codeReview;
    this.canTriggerJobs = options.canTriggerJobs ?? false;
    this.onMissingTryBuilds = options.onMissingTryBuilds ?? 'fail';
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Fetch, or trigger, try jobs for the current change.
   *
   * The result has exactly one entry per builder: its latest build on the
   * patchset, or a TRIGGERED/MISSING placeholder without a build number.
   *
   * @param patchset Patchset to read builds from. Defaults to the latest.
   * @throws UnresolvedBuildError if the branch has no issue, or builds are
   *   missing and cannot be triggered.
   */
  async fetchOrTriggerTryJobs(
    builderNames: Iterable<string>,
    patchset?: number,
  ): Promise<BuildStatusMap> {
    const builders = [...new Set(builderNames)].sort();
    const issueNumber = (await this.codeReview.getIssueNumber())?.trim();
    if (!issueNumber || !/^\d+$/.test(issueNumber)) {
      throw new UnresolvedBuildError('No issue number for current branch.');
    }
    const cl: ClRevision = {
      issue: Number.parseInt(issueNumber, 10),
      ...(patchset !== undefined ? { patchset } : {}),
    };

    this.logger.info(`Fetching status for ${pluralize('build', builders.length)} from ${formatClRevision(cl)}.`);
    const found = latestPerBuilder(await this.codeReview.latestTryBuilds(cl, builders), builders);
    if (found.size === 0 && !this.canTriggerJobs) {
      throw new UnresolvedBuildError('Aborted: no try jobs and triggering is disabled.');
    }

    const foundBuilders = found.builderNames();
    const missing = builders.filter((builder) => !foundBuilders.has(builder));
    if (missing.length === 0) {
      return found;
    }

    let placeholder: TryJobStatus = MISSING;
    if (this.canTriggerJobs) {
      this.logger.info(`Triggering try jobs for ${missing.join(', ')}.`);
      await this.codeReview.triggerTryBuilds(cl, missing);
      placeholder = TRIGGERED;
    } else if (this.onMissingTryBuilds === 'fail') {
      throw new UnresolvedBuildError(
        `Aborted: no try jobs for ${missing.join(', ')} and triggering is disabled.`,
        found,
      );
    }
    for (const builder of missing) {
      found.set(createBuild(builder, { bucket: TRY_BUCKET }), placeholder);
    }
    return found;
  }
}

/** Keep requested builders only, and for each of those its highest-numbered build. */
function latestPerBuilder(statuses: BuildStatusMap, builders: readonly string[]): BuildStatusMap {
  const requested = new Set(builders);
  const latest = new Map<string, { build: BuildIdentifier; status: TryJobStatus }>();
  for (const entry of statuses) {
    const name = entry.build.builderName;
    if (!requested.has(name)) {
      continue;
    }
    const current = latest.get(name);
    if (!current || (entry.build.buildNumber ?? -1) > (current.build.buildNumber ?? -1)) {
      latest.set(name, entry);
    }
  }
  return new BuildStatusMap([...latest.values()].map(({ build, status }) => [build, status] as const));
}
