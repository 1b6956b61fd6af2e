// packages/core/src/resolver/summary.ts — Swarming shard summary fetched from a step log

import { z } from 'zod';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';

/** Fetch a URL and return its JSON body. Rejects on transport or parse errors. */
export type JsonFetcher = (url: string) => Promise<unknown>;

const shardSchema = z
  .object({
    exit_code: z
      .union([z.number(), z.string().regex(/^-?\d+$/), z.null()])
      .optional()
      .transform((code) => (code === undefined || code === null ? 0 : Number(code))),
  })
  .passthrough();

// Swarming writes `null` for shards that never reported.
export const swarmingSummarySchema = z
  .object({
    shards: z.array(shardSchema.nullable()).default([]),
  })
  .passthrough();

export type SwarmingSummary = z.output<typeof swarmingSummarySchema>;

/**
 * GET a log's raw content as JSON. The `format=raw` parameter asks the log
 * viewer for the stream itself instead of its HTML page.
 */
export function createJsonFetcher(fetchImpl: typeof fetch = globalThis.fetch): JsonFetcher {
  return async (url) => {
    const target = new URL(url);
    target.searchParams.set('format', 'raw');
    const response = await fetchImpl(target, { headers: { Accept: 'application/json' } });
    if (!response.ok) {
      throw new Error(`GET ${target.toString()} failed with HTTP ${response.status}`);
    }
    return response.json();
  };
}

/**
 * Fetch and validate a shard summary. Returns undefined when it cannot be
 * fetched or does not look like a summary; the caller then has no extra
 * information and must not fail because of it.
 */
export async function fetchSwarmingSummary(
  fetchJson: JsonFetcher,
  url: string,
  logger: Logger = silentLogger,
): Promise<SwarmingSummary | undefined> {
  let content: unknown;
  try {
    content = await fetchJson(url);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof SyntaxError) {
      logger.warn(`Ignoring shard summary at ${url} that is not JSON: ${message}`);
    } else {
      logger.debug(`Could not fetch shard summary ${url}: ${message}`);
    }
    return undefined;
  }
  const parsed = swarmingSummarySchema.safeParse(content);
  if (!parsed.success) {
    logger.warn(`Ignoring malformed shard summary at ${url}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    return undefined;
  }
  return parsed.data;
}
