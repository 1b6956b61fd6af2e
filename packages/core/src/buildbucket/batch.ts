// packages/core/src/buildbucket/batch.ts — Queue of build queries sent as one Batch call

import { formatBuild } from '../builds/identifier.js';
import type { BuildIdentifier } from '../types/build.js';
import { BuildbucketError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { BuildbucketClient } from './client.js';
import { BUILD_FIELDS, toFieldMask } from './fields.js';
import type { BatchRequestItem, BuildPredicate, GetBuildRequest, RawBuild } from './schema.js';

interface QueuedRequest {
  item: BatchRequestItem;
  /** Max builds taken from a search response. */
  limit?: number;
  description: string;
}

/**
 * Requests are only queued until `execute()`, which sends them in a single
 * round trip. A batch executes once; make a new one per resolution pass.
 */
export class BuildBatch {
  private readonly queued: QueuedRequest[] = [];
  private executed = false;

  constructor(
    private readonly client: BuildbucketClient,
    private readonly logger: Logger,
  ) {}

  get size(): number {
    return this.queued.length;
  }

  /** Fetch one build, by id when known, otherwise by builder and number. */
  addGetBuild(build: BuildIdentifier, fields: readonly string[] = BUILD_FIELDS): this {
    this.assertOpen();
    const request: GetBuildRequest = { fields: toFieldMask(fields) };
    if (build.buildId !== undefined) {
      request.id = build.buildId;
    } else if (build.buildNumber !== undefined) {
      request.builder = this.client.builderId(build.bucket, build.builderName);
      request.buildNumber = build.buildNumber;
    } else {
      throw new TypeError(`Cannot get build for "${build.builderName}" without an id or number`);
    }
    this.queued.push({
      item: { getBuild: request },
      description: `get ${formatBuild(build)}${build.buildNumber === undefined ? ` (id ${build.buildId})` : ''}`,
    });
    return this;
  }

  /** Search builds, newest first, keeping at most `limit` of them. */
  addSearchBuilds(
    predicate: BuildPredicate,
    options: { limit: number; fields?: readonly string[] },
  ): this {
    this.assertOpen();
    if (!Number.isInteger(options.limit) || options.limit < 1) {
      throw new RangeError(`Search limit must be a positive integer, got ${options.limit}`);
    }
    this.queued.push({
      item: {
        searchBuilds: {
          predicate,
          fields: toFieldMask((options.fields ?? BUILD_FIELDS).map((path) => `builds.*.${path}`)),
          pageSize: options.limit,
        },
      },
      limit: options.limit,
      description: `search ${predicate.builder?.bucket ?? '*'}/${predicate.builder?.builder ?? '*'}`,
    });
    return this;
  }

  /**
   * Send every queued request and return the builds in request order.
   * A request the server answers with an error is logged and contributes
   * nothing; transport failures propagate.
   */
  async execute(): Promise<RawBuild[]> {
    this.assertOpen();
    this.executed = true;
    if (this.queued.length === 0) {
      return [];
    }

    const responses = await this.client.batch(this.queued.map((request) => request.item));
    const builds: RawBuild[] = [];
    responses.forEach((response, index) => {
      const request = this.queued[index];
      if (response.error) {
        this.logger.warn(
          `Buildbucket request failed (${request.description}): ${response.error.message ?? `code ${response.error.code ?? '?'}`}`,
        );
      } else if (response.getBuild) {
        builds.push(response.getBuild);
      } else if (response.searchBuilds) {
        builds.push(...(response.searchBuilds.builds ?? []).slice(0, request.limit));
      }
    });
    return builds;
  }

  private assertOpen(): void {
    if (this.executed) {
      throw new BuildbucketError('Batch has already been executed; create a new one', 'Batch');
    }
  }
}
