// packages/core/src/builds/identifier.ts — Construction, keys and ordering of build identifiers

import type { RawBuild } from '../buildbucket/schema.js';
import type { BuildIdentifier } from '../types/build.js';
import { TRY_BUCKET } from '../types/build.js';

export function createBuild(
  builderName: string,
  options: { bucket?: string; buildNumber?: number; buildId?: string } = {},
): BuildIdentifier {
  if (!builderName) {
    throw new TypeError('Builder name must not be empty');
  }
  if (
    options.buildNumber !== undefined &&
    (!Number.isInteger(options.buildNumber) || options.buildNumber < 0)
  ) {
    throw new TypeError(`Invalid build number for "${builderName}": ${options.buildNumber}`);
  }
  const build: BuildIdentifier = {
    builderName,
    bucket: options.bucket ?? TRY_BUCKET,
    ...(options.buildNumber !== undefined ? { buildNumber: options.buildNumber } : {}),
    ...(options.buildId !== undefined ? { buildId: options.buildId } : {}),
  };
  return Object.freeze(build);
}

/** Identifier of a build as Buildbucket returned it, id included. */
export function fromRawBuild(raw: RawBuild): BuildIdentifier {
  return createBuild(raw.builder.builder, {
    bucket: raw.builder.bucket,
    ...(raw.number !== undefined ? { buildNumber: raw.number } : {}),
    buildId: raw.id,
  });
}

/**
 * Equality key. The bucket is deliberately not part of it: a builder name
 * plus number (or id) already names exactly one build.
 */
export function buildKey(build: BuildIdentifier): string {
  return JSON.stringify([build.builderName, build.buildNumber ?? null, build.buildId ?? null]);
}

export function sameBuild(a: BuildIdentifier, b: BuildIdentifier): boolean {
  return buildKey(a) === buildKey(b);
}

/** Sort by builder name, then build number ascending; unnumbered builds last. */
export function compareBuilds(a: BuildIdentifier, b: BuildIdentifier): number {
  if (a.builderName !== b.builderName) {
    return a.builderName < b.builderName ? -1 : 1;
  }
  const left = a.buildNumber ?? Number.POSITIVE_INFINITY;
  const right = b.buildNumber ?? Number.POSITIVE_INFINITY;
  return left === right ? 0 : left < right ? -1 : 1;
}

export function formatBuildNumber(build: BuildIdentifier): string {
  return build.buildNumber === undefined ? '--' : String(build.buildNumber);
}

/** e.g. `try/linux-rel:12345`, `ci/mac-rel` */
export function formatBuild(build: BuildIdentifier): string {
  const suffix = build.buildNumber === undefined ? '' : `:${build.buildNumber}`;
  return `${build.bucket}/${build.builderName}${suffix}`;
}
