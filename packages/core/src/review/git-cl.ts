// packages/core/src/review/git-cl.ts — Try jobs of the Gerrit change the current branch tracks

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { BuildbucketClient } from '../buildbucket/client.js';
import { LIGHT_BUILD_FIELDS, toFieldMask } from '../buildbucket/fields.js';
import { fromRawBuild } from '../builds/identifier.js';
import { fromBuildbucketStatus } from '../builds/status.js';
import { BuildStatusMap } from '../builds/status-map.js';
import type { GerritChange } from '../types/build.js';
import { TRY_BUCKET } from '../types/build.js';
import { TRY_SEARCH_LIMIT } from '../utils/constants.js';
import { GitError, UnresolvedBuildError } from '../utils/errors.js';
import { generateRequestId } from '../utils/id.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import type { ClRevision, CodeReview } from './types.js';

const execFileAsync = promisify(execFile);

/**
 * Run git and return trimmed stdout, or undefined when git exits with
 * status 1 (how `git config --get` reports an unset key).
 */
export type GitRunner = (args: readonly string[]) => Promise<string | undefined>;

export function createGitRunner(cwd: string = process.cwd()): GitRunner {
  return async (args) => {
    try {
      const { stdout } = await execFileAsync('git', [...args], { cwd, encoding: 'utf-8' });
      return stdout.trim();
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 1) {
        return undefined;
      }
      const exitCode =
        typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'number'
          ? error.code
          : undefined;
      throw new GitError(
        `git ${args.join(' ')} failed: ${error instanceof Error ? error.message : String(error)}`,
        ['git', ...args],
        exitCode,
      );
    }
  };
}

export interface GitClCodeReviewOptions {
  buildbucket: BuildbucketClient;
  gerritHost: string;
  gerritProject: string;
  git?: GitRunner;
  logger?: Logger;
}

/**
 * Reads the change from the branch config `git cl upload` leaves behind
 * (`branch.<name>.gerritissue`, `branch.<name>.gerritpatchset`) and talks to
 * Buildbucket for its try builds.
 */
export class GitClCodeReview implements CodeReview {
  private readonly buildbucket: BuildbucketClient;
  private readonly gerritHost: string;
  private readonly gerritProject: string;
  private readonly git: GitRunner;
  private readonly logger: Logger;

  constructor(options: GitClCodeReviewOptions) {
    this.buildbucket = options.buildbucket;
    this.gerritHost = options.gerritHost;
    this.gerritProject = options.gerritProject;
    this.git = options.git ?? createGitRunner();
    this.logger = options.logger ?? silentLogger;
  }

  async currentBranch(): Promise<string | undefined> {
    return this.git(['symbolic-ref', '--quiet', '--short', 'HEAD']);
  }

  async getIssueNumber(): Promise<string | undefined> {
    return this.branchConfig('gerritissue');
  }

  /** Latest patchset uploaded from this branch, if recorded. */
  async getLatestPatchset(): Promise<number | undefined> {
    const value = await this.branchConfig('gerritpatchset');
    return value && /^\d+$/.test(value) ? Number.parseInt(value, 10) : undefined;
  }

  async latestTryBuilds(cl: ClRevision, builderNames: readonly string[]): Promise<BuildStatusMap> {
    const change = await this.gerritChange(cl);
    const batch = this.buildbucket.newBatch();
    for (const builder of builderNames) {
      batch.addSearchBuilds(
        { builder: this.buildbucket.builderId(TRY_BUCKET, builder), gerritChanges: [change] },
        { limit: TRY_SEARCH_LIMIT, fields: LIGHT_BUILD_FIELDS },
      );
    }
    const statuses = new BuildStatusMap();
    for (const raw of await batch.execute()) {
      statuses.set(fromRawBuild(raw), fromBuildbucketStatus(raw.status));
    }
    this.logger.debug(`Found ${statuses.size} try builds on change ${change.change}/${change.patchset}`);
    return statuses;
  }

  async triggerTryBuilds(cl: ClRevision, builderNames: readonly string[]): Promise<void> {
    const change = await this.gerritChange(cl);
    await this.buildbucket.scheduleBuilds(
      builderNames.map((builder) => ({
        requestId: generateRequestId(),
        builder: this.buildbucket.builderId(TRY_BUCKET, builder),
        gerritChanges: [change],
        fields: toFieldMask(LIGHT_BUILD_FIELDS),
      })),
    );
  }

  private async gerritChange(cl: ClRevision): Promise<GerritChange> {
    const patchset = cl.patchset ?? (await this.getLatestPatchset());
    if (patchset === undefined) {
      throw new UnresolvedBuildError(
        `No patchset recorded for issue ${cl.issue}; upload the change or pass a patchset.`,
      );
    }
    return { host: this.gerritHost, project: this.gerritProject, change: cl.issue, patchset };
  }

  private async branchConfig(key: string): Promise<string | undefined> {
    const branch = await this.currentBranch();
    if (!branch) {
      return undefined;
    }
    const value = await this.git(['config', '--get', `branch.${branch}.${key}`]);
    return value || undefined;
  }
}
