// packages/core/src/buildbucket/schema.ts — Wire shapes of the Buildbucket v2 pRPC API

import { z } from 'zod';
import type { BuilderId, BuildbucketStatus, GerritChange } from '../types/build.js';

// Response validation is lenient: unknown fields pass through and everything
// a field mask can leave out is optional.

const logSchema = z
  .object({
    name: z.string(),
    viewUrl: z.string().optional(),
    url: z.string().optional(),
  })
  .passthrough();

const stepSchema = z
  .object({
    name: z.string(),
    status: z.string().optional(),
    logs: z.array(logSchema).optional(),
  })
  .passthrough();

const int64Schema = z.union([z.string(), z.number().int()]).transform(String);

export const rawBuildSchema = z
  .object({
    id: int64Schema,
    number: z.number().int().nonnegative().optional(),
    builder: z
      .object({
        project: z.string().optional(),
        bucket: z.string(),
        builder: z.string(),
      })
      .passthrough(),
    status: z.string().default('STATUS_UNSPECIFIED'),
    output: z
      .object({
        properties: z.record(z.string(), z.unknown()).optional(),
      })
      .passthrough()
      .optional(),
    steps: z.array(stepSchema).optional(),
  })
  .passthrough();

export type RawBuild = z.output<typeof rawBuildSchema>;
export type RawStep = z.output<typeof stepSchema>;
export type RawLog = z.output<typeof logSchema>;

const rpcStatusSchema = z.object({
  code: z.number().int().optional(),
  message: z.string().optional(),
});

const batchResponseItemSchema = z.object({
  getBuild: rawBuildSchema.optional(),
  searchBuilds: z
    .object({
      builds: z.array(rawBuildSchema).optional(),
      nextPageToken: z.string().optional(),
    })
    .optional(),
  scheduleBuild: rawBuildSchema.optional(),
  error: rpcStatusSchema.optional(),
});

export const batchResponseSchema = z.object({
  responses: z.array(batchResponseItemSchema).default([]),
});

export type BatchResponseItem = z.output<typeof batchResponseItemSchema>;

// ── Requests ──

export interface BuildPredicate {
  builder?: BuilderId;
  status?: BuildbucketStatus;
  gerritChanges?: GerritChange[];
  includeExperimental?: boolean;
}

export interface GetBuildRequest {
  id?: string;
  builder?: BuilderId;
  buildNumber?: number;
  fields?: string;
}

export interface SearchBuildsRequest {
  predicate: BuildPredicate;
  fields?: string;
  pageSize?: number;
}

export interface ScheduleBuildRequest {
  requestId?: string;
  builder: BuilderId;
  gerritChanges?: GerritChange[];
  tags?: Array<{ key: string; value: string }>;
  fields?: string;
}

export type BatchRequestItem =
  | { getBuild: GetBuildRequest }
  | { searchBuilds: SearchBuildsRequest }
  | { scheduleBuild: ScheduleBuildRequest };
