// packages/core/src/buildbucket/client.ts — pRPC client for buildbucket.v2.Builds

import type { BuilderId } from '../types/build.js';
import { PRPC_XSSI_PREFIX } from '../utils/constants.js';
import { BuildbucketError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { BuildBatch } from './batch.js';
import type { BatchRequestItem, BatchResponseItem, RawBuild, ScheduleBuildRequest } from './schema.js';
import { batchResponseSchema } from './schema.js';

export interface BuildbucketClientOptions {
  /** e.g. "cr-buildbucket.appspot.com" */
  host: string;
  /** LUCI project builders belong to, e.g. "chromium". */
  project: string;
  fetch?: typeof fetch;
  logger?: Logger;
}

export class BuildbucketClient {
  static readonly SERVICE = 'buildbucket.v2.Builds';

  readonly host: string;
  readonly project: string;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: BuildbucketClientOptions) {
    this.host = options.host;
    this.project = options.project;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.logger = options.logger ?? silentLogger;
  }

  builderId(bucket: string, builder: string): BuilderId {
    return { project: this.project, bucket, builder };
  }

  /** A fresh, single-use batch. */
  newBatch(): BuildBatch {
    return new BuildBatch(this, this.logger);
  }

  /**
   * Invoke one method. Network errors from fetch propagate as they are;
   * HTTP errors and unreadable bodies become BuildbucketError.
   */
  async call(method: string, body: unknown): Promise<unknown> {
    const url = `https://${this.host}/prpc/${BuildbucketClient.SERVICE}/${method}`;
    this.logger.debug(`POST ${url}`);
    const response = await this.fetchImpl(url, {
      method: 'POST',
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
    });
    const text = await response.text();

    if (!response.ok) {
      const grpcCode = response.headers.get('x-prpc-grpc-code');
      throw new BuildbucketError(
        `${method} failed with HTTP ${response.status}: ${text.trim().slice(0, 500)}`,
        method,
        response.status,
        grpcCode === null ? undefined : Number.parseInt(grpcCode, 10),
      );
    }

    const payload = text.startsWith(PRPC_XSSI_PREFIX) ? text.slice(PRPC_XSSI_PREFIX.length) : text;
    try {
      return JSON.parse(payload);
    } catch (err) {
      throw new BuildbucketError(
        `${method} returned a body that is not JSON: ${err instanceof Error ? err.message : String(err)}`,
        method,
        response.status,
      );
    }
  }

  /** Send requests in one Batch call. Responses line up with requests. */
  async batch(requests: readonly BatchRequestItem[]): Promise<BatchResponseItem[]> {
    const parsed = batchResponseSchema.safeParse(await this.call('Batch', { requests }));
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new BuildbucketError(`Batch returned an unexpected response: ${issues}`, 'Batch');
    }
    const { responses } = parsed.data;
    if (responses.length !== requests.length) {
      throw new BuildbucketError(
        `Batch returned ${responses.length} responses for ${requests.length} requests`,
        'Batch',
      );
    }
    return responses;
  }

  /** Schedule builds in one round trip. Any per-build error fails the whole call. */
  async scheduleBuilds(requests: readonly ScheduleBuildRequest[]): Promise<RawBuild[]> {
    if (requests.length === 0) {
      return [];
    }
    const responses = await this.batch(requests.map((scheduleBuild) => ({ scheduleBuild })));
    const scheduled: RawBuild[] = [];
    responses.forEach((response, index) => {
      const builder = requests[index].builder.builder;
      if (response.error) {
        throw new BuildbucketError(
          `Failed to schedule a build for "${builder}": ${response.error.message ?? 'unknown error'}`,
          'ScheduleBuild',
          undefined,
          response.error.code,
        );
      }
      if (response.scheduleBuild) {
        this.logger.debug(`Scheduled build ${response.scheduleBuild.id} for "${builder}"`);
        scheduled.push(response.scheduleBuild);
      }
    });
    return scheduled;
  }
}
