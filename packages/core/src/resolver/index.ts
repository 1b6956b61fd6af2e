// packages/core/src/resolver/index.ts -- barrel re-export

export { BuildResolver } from './resolver.js';
export type { BuildResolverOptions } from './resolver.js';
export { InterruptionClassifier } from './classifier.js';
export type { InterruptionClassifierOptions } from './classifier.js';
export { TryJobInference } from './try-jobs.js';
export type { TryJobInferenceOptions } from './try-jobs.js';
export { createJsonFetcher, fetchSwarmingSummary, swarmingSummarySchema } from './summary.js';
export type { JsonFetcher, SwarmingSummary } from './summary.js';
export { INFRA_ERROR_EXIT_CODES } from './exit-codes.js';
export { formatBuildTable, logBuilds, warnAboutIncompleteResults } from './report.js';
export { createResolver } from './factory.js';
export type { CreateResolverOptions } from './factory.js';
