// packages/cli/src/parse.ts — Command line value parsers

import type { BuildIdentifier } from '@buildstat/core';
import { TRY_BUCKET, createBuild } from '@buildstat/core';
import { InvalidArgumentError } from 'commander';

/**
 * Parse `[bucket/]builder[:number]`, e.g. `linux-rel`, `ci/mac-rel`,
 * `try/linux-rel:1234`. The bucket defaults to `try`. Builder names may
 * contain spaces but not slashes.
 */
export function parseBuildSpec(spec: string): BuildIdentifier {
  let rest = spec.trim();
  let bucket = TRY_BUCKET;
  let buildNumber: number | undefined;

  const slash = rest.indexOf('/');
  if (slash >= 0) {
    bucket = rest.slice(0, slash);
    rest = rest.slice(slash + 1);
  }
  const numbered = /^(.*):(\d+)$/.exec(rest);
  if (numbered) {
    rest = numbered[1];
    buildNumber = Number.parseInt(numbered[2], 10);
  }
  if (!bucket || !rest.trim() || rest.includes('/') || rest.includes(':')) {
    throw new InvalidArgumentError(`Invalid build "${spec}": expected [bucket/]builder[:number]`);
  }
  return createBuild(rest.trim(), { bucket, ...(buildNumber !== undefined ? { buildNumber } : {}) });
}

export function parsePositiveInt(label: string): (value: string) => number {
  return (value: string) => {
    if (!/^\d+$/.test(value)) throw new InvalidArgumentError(`${label} must be a positive integer`);
    const n = Number.parseInt(value, 10);
    if (n <= 0) throw new InvalidArgumentError(`${label} must be a positive integer`);
    return n;
  };
}
