// packages/core/src/utils/errors.ts

import type { BuildStatusMap } from '../builds/status-map.js';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when resolution has to stop so the user can decide what to do next.
 *
 * Not necessarily a failure: waiting on try jobs this run just triggered ends
 * the same way. `buildStatuses` carries whatever was resolved before stopping.
 */
export class UnresolvedBuildError extends Error {
  constructor(
    public readonly reason: string,
    public readonly buildStatuses?: BuildStatusMap,
  ) {
    super(reason);
    this.name = 'UnresolvedBuildError';
  }
}

export class BuildbucketError extends Error {
  constructor(
    message: string,
    public readonly method?: string,
    public readonly httpStatus?: number,
    public readonly code?: number,
  ) {
    super(message);
    this.name = 'BuildbucketError';
  }
}

export class GitError extends Error {
  constructor(
    message: string,
    public readonly command: readonly string[],
    public readonly exitCode?: number,
  ) {
    super(message);
    this.name = 'GitError';
  }
}
