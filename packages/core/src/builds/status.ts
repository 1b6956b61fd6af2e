// packages/core/src/builds/status.ts

import type { BuildbucketStatus } from '../types/build.js';
import type { TryJobResult, TryJobStatus } from '../types/status.js';

export const SCHEDULED: TryJobStatus = Object.freeze({ status: 'SCHEDULED' });
export const STARTED: TryJobStatus = Object.freeze({ status: 'STARTED' });
export const INFRA_FAILURE: TryJobStatus = Object.freeze({ status: 'INFRA_FAILURE' });
export const TRIGGERED: TryJobStatus = Object.freeze({ status: 'TRIGGERED' });
export const MISSING: TryJobStatus = Object.freeze({ status: 'MISSING' });

export function completed(result: TryJobResult): TryJobStatus {
  return Object.freeze({ status: 'COMPLETED', result });
}

/**
 * Map a status reported by Buildbucket. Anything that ended without a
 * SUCCESS/FAILURE verdict (CANCELED, or a status this code does not know)
 * becomes COMPLETED with an unknown result.
 */
export function fromBuildbucketStatus(status: BuildbucketStatus | (string & {})): TryJobStatus {
  switch (status) {
    case 'SCHEDULED':
      return SCHEDULED;
    case 'STARTED':
      return STARTED;
    case 'SUCCESS':
      return completed('SUCCESS');
    case 'FAILURE':
      return completed('FAILURE');
    case 'INFRA_FAILURE':
      return INFRA_FAILURE;
    default:
      return completed(null);
  }
}

export function isFinished(status: TryJobStatus): boolean {
  return status.status === 'COMPLETED' || status.status === 'INFRA_FAILURE';
}

/** The build ended but its test results cannot be trusted to be complete. */
export function hasIncompleteResults(status: TryJobStatus): boolean {
  switch (status.status) {
    case 'INFRA_FAILURE':
      return true;
    case 'COMPLETED':
      return status.result === null;
    case 'SCHEDULED':
    case 'STARTED':
    case 'TRIGGERED':
    case 'MISSING':
      return false;
  }
}

export function sameStatus(a: TryJobStatus, b: TryJobStatus): boolean {
  if (a.status === 'COMPLETED' && b.status === 'COMPLETED') {
    return a.result === b.result;
  }
  return a.status === b.status;
}

/** Text shown in the STATUS column: the result for finished builds, the state otherwise. */
export function statusLabel(status: TryJobStatus): string {
  switch (status.status) {
    case 'COMPLETED':
      return status.result ?? '--';
    case 'INFRA_FAILURE':
    case 'SCHEDULED':
    case 'STARTED':
    case 'TRIGGERED':
    case 'MISSING':
      return status.status;
  }
}
