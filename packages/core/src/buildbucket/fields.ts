// packages/core/src/buildbucket/fields.ts — Field masks for build requests

/**
 * Everything the interruption classifier reads. Leaving out a step or log
 * path does not fail a request; it only makes classification less precise.
 */
export const BUILD_FIELDS: readonly string[] = Object.freeze([
  'id',
  'number',
  'builder.builder',
  'builder.bucket',
  'status',
  'output.properties',
  'steps.*.name',
  'steps.*.logs.*.name',
  'steps.*.logs.*.view_url',
]);

/** Enough to identify a build and tell whether it finished. */
export const LIGHT_BUILD_FIELDS: readonly string[] = Object.freeze([
  'id',
  'number',
  'builder.builder',
  'builder.bucket',
  'status',
]);

function toLowerCamel(segment: string): string {
  return segment.replace(/_([a-z])/g, (_match, letter: string) => letter.toUpperCase());
}

/** Serialize paths the way protobuf JSON encodes a FieldMask. */
export function toFieldMask(paths: readonly string[]): string {
  return paths.map((path) => path.split('.').map(toLowerCamel).join('.')).join(',');
}
