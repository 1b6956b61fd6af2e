// packages/core/src/utils/index.ts -- barrel re-export

export { generateRequestId } from './id.js';
export { ConfigError, UnresolvedBuildError, BuildbucketError, GitError } from './errors.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LogLevel, LoggerOptions } from './logger.js';
export { pluralize } from './grammar.js';
export { sequentialPool, createWorkerPool } from './pool.js';
export type { WorkerPool } from './pool.js';
