// packages/cli/src/utils.ts

/** Something broke: bad input, transport or server errors. */
export const EXIT_FAILURE = 1;

/** Resolution stopped on purpose, e.g. waiting for triggered try jobs. */
export const EXIT_UNRESOLVED = 2;
