// packages/core/src/utils/grammar.ts

/** "1 build", "2 builds", "0 builds". */
export function pluralize(noun: string, count: number, plural = `${noun}s`): string {
  return `${count} ${count === 1 ? noun : plural}`;
}
