// @buildstat/core - Resolve builders and build numbers into try job statuses

export const VERSION = '0.1.0';

// Type definitions
export type {
  BuildIdentifier,
  BuilderId,
  GerritChange,
  BuildbucketStatus,
  TryJobStatus,
  TryJobStatusCode,
  TryJobResult,
  BuildstatConfig,
  MissingTryBuildPolicy,
} from './types/index.js';
export { TRY_BUCKET, CI_BUCKET } from './types/index.js';

// Utilities
export {
  generateRequestId,
  ConfigError,
  UnresolvedBuildError,
  BuildbucketError,
  GitError,
  createLogger,
  silentLogger,
  pluralize,
  sequentialPool,
  createWorkerPool,
} from './utils/index.js';
export type { Logger, LogLevel, LoggerOptions, WorkerPool } from './utils/index.js';

// Configuration
export {
  DEFAULT_CONFIG,
  DEFAULT_TEST_STEP_PATTERN,
  DEFAULT_SUMMARY_LOG_NAME,
  buildstatConfigSchema,
  validateConfig,
  loadConfig,
  writeConfig,
  CONFIG_FILENAME,
} from './config/index.js';
export type { BuildstatConfigInput } from './config/index.js';

// Builds and statuses
export {
  createBuild,
  fromRawBuild,
  buildKey,
  sameBuild,
  compareBuilds,
  formatBuild,
  formatBuildNumber,
  SCHEDULED,
  STARTED,
  INFRA_FAILURE,
  TRIGGERED,
  MISSING,
  completed,
  fromBuildbucketStatus,
  isFinished,
  hasIncompleteResults,
  sameStatus,
  statusLabel,
  BuildStatusMap,
} from './builds/index.js';
export type { BuildStatusEntry } from './builds/index.js';

// Buildbucket
export {
  BuildbucketClient,
  BuildBatch,
  BUILD_FIELDS,
  LIGHT_BUILD_FIELDS,
  toFieldMask,
  rawBuildSchema,
  batchResponseSchema,
} from './buildbucket/index.js';
export type {
  BuildbucketClientOptions,
  RawBuild,
  RawStep,
  RawLog,
  BatchRequestItem,
  BatchResponseItem,
  BuildPredicate,
  GetBuildRequest,
  SearchBuildsRequest,
  ScheduleBuildRequest,
} from './buildbucket/index.js';

// Code review
export { GitClCodeReview, createGitRunner, formatClRevision } from './review/index.js';
export type { GitClCodeReviewOptions, GitRunner, ClRevision, CodeReview } from './review/index.js';

// Resolver
export {
  BuildResolver,
  InterruptionClassifier,
  TryJobInference,
  createJsonFetcher,
  fetchSwarmingSummary,
  swarmingSummarySchema,
  INFRA_ERROR_EXIT_CODES,
  formatBuildTable,
  logBuilds,
  warnAboutIncompleteResults,
  createResolver,
} from './resolver/index.js';
export type {
  BuildResolverOptions,
  InterruptionClassifierOptions,
  TryJobInferenceOptions,
  JsonFetcher,
  SwarmingSummary,
  CreateResolverOptions,
} from './resolver/index.js';
