// packages/core/src/builds/index.ts -- barrel re-export

export {
  createBuild,
  fromRawBuild,
  buildKey,
  sameBuild,
  compareBuilds,
  formatBuild,
  formatBuildNumber,
} from './identifier.js';
export {
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
} from './status.js';
export { BuildStatusMap } from './status-map.js';
export type { BuildStatusEntry } from './status-map.js';
