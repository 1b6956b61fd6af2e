// packages/core/src/types/status.ts — Resolver output statuses

export type TryJobResult = 'SUCCESS' | 'FAILURE' | null;

/**
 * Status of one resolved build.
 *
 * TRIGGERED and MISSING never come from Buildbucket: TRIGGERED means this run
 * scheduled the build, MISSING means a try builder has no build and none was
 * scheduled. Only COMPLETED carries a result; null means the build ended
 * without one (e.g. it was canceled).
 */
export type TryJobStatus =
  | { readonly status: 'SCHEDULED' }
  | { readonly status: 'STARTED' }
  | { readonly status: 'COMPLETED'; readonly result: TryJobResult }
  | { readonly status: 'INFRA_FAILURE' }
  | { readonly status: 'TRIGGERED' }
  | { readonly status: 'MISSING' };

export type TryJobStatusCode = TryJobStatus['status'];
