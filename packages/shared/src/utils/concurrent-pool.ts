/** Outcome of one item processed by {@link ConcurrentPool.settle} */
export type PoolOutcome<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown };

/**
 * ConcurrentPool - Worker pool utility for concurrent task execution.
 *
 * The pool keeps N workers active at all times. When a worker finishes,
 * it immediately picks up the next available item.
 */
export class ConcurrentPool {
  /**
   * Process items with at most `concurrency` in flight.
   * Results keep the input order. The first rejection rejects the whole run.
   *
   * @param onItemComplete - Optional callback fired after each item completes
   */
  static async run<T, R>(
    items: readonly T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    onItemComplete?: (result: R, index: number) => void,
  ): Promise<R[]> {
    const results: R[] = new Array(items.length);
    let nextIndex = 0;

    async function worker(): Promise<void> {
      while (nextIndex < items.length) {
        const index = nextIndex++;
        results[index] = await processFn(items[index], index);
        onItemComplete?.(results[index], index);
      }
    }

    await Promise.all(
      ConcurrentPool.spawnWorkers(items.length, concurrency, worker),
    );
    return results;
  }

  /**
   * Like {@link run}, but a failing item does not stop the others.
   * Each position of the result holds that item's outcome.
   */
  static async settle<T, R>(
    items: readonly T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
  ): Promise<PoolOutcome<R>[]> {
    return ConcurrentPool.run(items, concurrency, async (item, index): Promise<PoolOutcome<R>> => {
      try {
        const value = await processFn(item, index);
        return { status: 'fulfilled', value };
      } catch (reason) {
        return { status: 'rejected', reason };
      }
    });
  }

  private static spawnWorkers(
    itemCount: number,
    concurrency: number,
    worker: () => Promise<void>,
  ): Promise<void>[] {
    const workerCount = Math.max(1, Math.min(concurrency, itemCount));
    return Array.from({ length: itemCount === 0 ? 0 : workerCount }, () =>
      worker(),
    );
  }
}
