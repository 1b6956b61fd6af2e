// packages/core/src/resolver/exit-codes.ts — Web test harness exit statuses

/** Harness killed by SIGINT (128 + 2). */
export const INTERRUPTED_EXIT_STATUS = 130;
/** Harness stopped early after too many unexpected failures or crashes. */
export const EARLY_EXIT_STATUS = 251;
export const SYS_DEPS_EXIT_STATUS = 252;
export const NO_TESTS_EXIT_STATUS = 253;
export const UNEXPECTED_ERROR_EXIT_STATUS = 255;

/**
 * Exit statuses meaning the shard's results are incomplete for reasons
 * unrelated to the code under test.
 */
export const INFRA_ERROR_EXIT_CODES: ReadonlySet<number> = new Set([
  INTERRUPTED_EXIT_STATUS,
  EARLY_EXIT_STATUS,
  SYS_DEPS_EXIT_STATUS,
  NO_TESTS_EXIT_STATUS,
  UNEXPECTED_ERROR_EXIT_STATUS,
]);
