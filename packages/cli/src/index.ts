// packages/cli/src/index.ts — buildstat entry point

import { createProgram } from './program.js';

const program = createProgram();

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});

export { program };
