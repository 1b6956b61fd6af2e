// packages/core/src/utils/constants.ts — Shared magic number constants

/** Minimum width of the builder column in build tables */
export const BUILDER_COLUMN_MIN_WIDTH = 20;

/** Widths of the NUMBER, STATUS and BUCKET columns in build tables */
export const NUMBER_COLUMN_WIDTH = 7;
export const STATUS_COLUMN_WIDTH = 9;
export const BUCKET_COLUMN_WIDTH = 6;

/** Default number of concurrent shard summary fetches */
export const DEFAULT_IO_CONCURRENCY = 8;

/** Builds returned per CI "latest failure" search */
export const CI_SEARCH_LIMIT = 1;

/** Builds returned per try builder when looking up a patchset */
export const TRY_SEARCH_LIMIT = 1;

/** pRPC responses start with this line to defeat JSON hijacking */
export const PRPC_XSSI_PREFIX = ")]}'";
