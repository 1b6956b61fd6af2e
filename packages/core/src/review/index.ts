// packages/core/src/review/index.ts -- barrel re-export

export { GitClCodeReview, createGitRunner } from './git-cl.js';
export type { GitClCodeReviewOptions, GitRunner } from './git-cl.js';
export { formatClRevision } from './types.js';
export type { ClRevision, CodeReview } from './types.js';
