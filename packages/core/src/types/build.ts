// packages/core/src/types/build.ts — Build identity types

/**
 * A requested or resolved build. `buildNumber` left unset means "infer it":
 * the try build on the current change, or the latest failing CI build.
 * Values are frozen; compare them with `buildKey`, never by reference.
 */
export interface BuildIdentifier {
  readonly builderName: string;
  readonly bucket: string;
  readonly buildNumber?: number;
  /** Buildbucket's int64 build id, kept as a string. Set once resolved. */
  readonly buildId?: string;
}

export interface BuilderId {
  readonly project: string;
  readonly bucket: string;
  readonly builder: string;
}

export interface GerritChange {
  readonly host: string;
  readonly project: string;
  readonly change: number;
  readonly patchset: number;
}

/** Buildbucket statuses a build can report. */
export type BuildbucketStatus =
  | 'SCHEDULED'
  | 'STARTED'
  | 'SUCCESS'
  | 'FAILURE'
  | 'INFRA_FAILURE'
  | 'CANCELED';

export const TRY_BUCKET = 'try';
export const CI_BUCKET = 'ci';
