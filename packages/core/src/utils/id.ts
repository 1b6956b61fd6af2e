// packages/core/src/utils/id.ts

import { nanoid } from 'nanoid';

/** Idempotency key for a ScheduleBuild request, e.g. "trigger_V1StGXR8_Z5jdHi6". */
export function generateRequestId(prefix = 'trigger'): string {
  return `${prefix}_${nanoid(16)}`;
}
