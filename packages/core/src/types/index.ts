// packages/core/src/types/index.ts -- barrel re-export

export type { BuildIdentifier, BuilderId, GerritChange, BuildbucketStatus } from './build.js';
export { TRY_BUCKET, CI_BUCKET } from './build.js';
export type { TryJobStatus, TryJobStatusCode, TryJobResult } from './status.js';
export type { BuildstatConfig, MissingTryBuildPolicy } from './config.js';
