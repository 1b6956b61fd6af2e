// packages/core/src/review/types.ts — Code review boundary used for try jobs

import type { BuildStatusMap } from '../builds/status-map.js';

/** A pending change, optionally pinned to one patchset. */
export interface ClRevision {
  readonly issue: number;
  readonly patchset?: number;
}

export function formatClRevision(cl: ClRevision): string {
  return cl.patchset === undefined ? `CL ${cl.issue}` : `CL ${cl.issue}/${cl.patchset}`;
}

export interface CodeReview {
  /** Issue number of the change the current branch uploads to, if any. */
  getIssueNumber(): Promise<string | undefined>;

  /**
   * Latest try build per builder on `cl`. Builders without a build are
   * absent from the result. Statuses come from a light field mask and are
   * not classified for interruptions.
   */
  latestTryBuilds(cl: ClRevision, builderNames: readonly string[]): Promise<BuildStatusMap>;

  /** Schedule one try build per builder on `cl`, in a single call. */
  triggerTryBuilds(cl: ClRevision, builderNames: readonly string[]): Promise<void>;
}
