import { describe, expect, test, vi } from 'vitest';

import { ConcurrentPool } from './concurrent-pool';

describe('ConcurrentPool', () => {
  describe('run', () => {
    test('processes all items and returns results in order', async () => {
      const results = await ConcurrentPool.run(
        [1, 2, 3, 4, 5],
        3,
        async (item) => item * 10,
      );

      expect(results).toEqual([10, 20, 30, 40, 50]);
    });

    test('returns empty array for empty input', async () => {
      const processFn = vi.fn(async (item: number) => item);

      const results = await ConcurrentPool.run([], 5, processFn);

      expect(results).toEqual([]);
      expect(processFn).not.toHaveBeenCalled();
    });

    test('never exceeds the concurrency limit', async () => {
      let active = 0;
      let maxActive = 0;
      const items = Array.from({ length: 8 }, (_, i) => i);

      await ConcurrentPool.run(items, 3, async (item) => {
        active++;
        maxActive = Math.max(maxActive, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active--;
        return item;
      });

      expect(maxActive).toBe(3);
    });

    test('treats a concurrency below one as one worker', async () => {
      const results = await ConcurrentPool.run([1, 2], 0, async (i) => i + 1);

      expect(results).toEqual([2, 3]);
    });

    test('fires onItemComplete with each result and index', async () => {
      const onItemComplete = vi.fn();

      await ConcurrentPool.run(
        ['a', 'b'],
        1,
        async (s) => s.toUpperCase(),
        onItemComplete,
      );

      expect(onItemComplete).toHaveBeenNthCalledWith(1, 'A', 0);
      expect(onItemComplete).toHaveBeenNthCalledWith(2, 'B', 1);
    });

    test('rejects when an item fails', async () => {
      await expect(
        ConcurrentPool.run([1, 2], 2, async (item) => {
          if (item === 2) {
            throw new Error('page 2 broken');
          }
          return item;
        }),
      ).rejects.toThrow('page 2 broken');
    });
  });

  describe('settle', () => {
    test('keeps going after a failure and reports each outcome', async () => {
      const failure = new Error('bad page');

      const outcomes = await ConcurrentPool.settle(
        [1, 2, 3],
        2,
        async (item) => {
          if (item === 2) {
            throw failure;
          }
          return item * 2;
        },
      );

      expect(outcomes).toEqual([
        { status: 'fulfilled', value: 2 },
        { status: 'rejected', reason: failure },
        { status: 'fulfilled', value: 6 },
      ]);
    });
  });
});
