// packages/core/src/buildbucket/index.ts -- barrel re-export

export { BuildbucketClient } from './client.js';
export type { BuildbucketClientOptions } from './client.js';
export { BuildBatch } from './batch.js';
export { BUILD_FIELDS, LIGHT_BUILD_FIELDS, toFieldMask } from './fields.js';
export { rawBuildSchema, batchResponseSchema } from './schema.js';
export type {
  RawBuild,
  RawStep,
  RawLog,
  BatchRequestItem,
  BatchResponseItem,
  BuildPredicate,
  GetBuildRequest,
  SearchBuildsRequest,
  ScheduleBuildRequest,
} from './schema.js';
