// packages/core/src/utils/pool.ts — Injected concurrency for independent I/O

/**
 * Runs independent async tasks. Implementations may overlap tasks but must
 * return results in input order; callers never depend on execution order.
 */
export interface WorkerPool {
  readonly concurrency: number;
  map<T, R>(items: readonly T[], fn: (item: T, index: number) => Promise<R>): Promise<R[]>;
}

/** Runs one task at a time. */
export const sequentialPool: WorkerPool = {
  concurrency: 1,
  async map<T, R>(items: readonly T[], fn: (item: T, index: number) => Promise<R>): Promise<R[]> {
    const results: R[] = [];
    for (let i = 0; i < items.length; i++) {
      results.push(await fn(items[i], i));
    }
    return results;
  },
};

/**
 * Pool with at most `concurrency` tasks in flight. The first rejection is
 * propagated once in-flight tasks settle; no new tasks start after it.
 */
export function createWorkerPool(concurrency: number): WorkerPool {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Pool concurrency must be a positive integer, got ${concurrency}`);
  }
  if (concurrency === 1) {
    return sequentialPool;
  }

  return {
    concurrency,
    async map<T, R>(items: readonly T[], fn: (item: T, index: number) => Promise<R>): Promise<R[]> {
      const results = new Array<R>(items.length);
      let next = 0;
      let failed = false;

      async function worker(): Promise<void> {
        while (!failed && next < items.length) {
          const index = next++;
          try {
            results[index] = await fn(items[index], index);
          } catch (error) {
            failed = true;
            throw error;
          }
        }
      }

      const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => worker());
      const settled = await Promise.allSettled(workers);
      for (const outcome of settled) {
        if (outcome.status === 'rejected') {
          throw outcome.reason;
        }
      }
      return results;
    },
  };
}
