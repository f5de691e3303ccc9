import { describe, it, expect } from 'vitest';
import { processPool, processStream, type PoolResult } from './work-pool';

async function* fromArray<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}

describe('processPool', () => {
  it('should process all items', async () => {
    const results = await processPool([1, 2, 3, 4, 5], async (item) => item * 2, 3);

    expect(results.map((result) => result.success && result.value)).toEqual([2, 4, 6, 8, 10]);
  });

  it('should handle empty items', async () => {
    expect(await processPool([], async (item: number) => item, 3)).toEqual([]);
  });

  it('should respect max concurrency', async () => {
    let activeTasks = 0;
    let maxActive = 0;

    await processPool(
      [1, 2, 3, 4, 5, 6],
      async () => {
        activeTasks++;
        maxActive = Math.max(maxActive, activeTasks);
        await new Promise((resolve) => setTimeout(resolve, 10));
        activeTasks--;
      },
      2,
    );

    expect(maxActive).toBe(2);
  });

  it('should continue processing after errors', async () => {
    const results = await processPool(
      [1, 2, 3],
      async (item) => {
        if (item === 2) {
          throw new Error('test error');
        }
        return item;
      },
      2,
    );

    expect(results[0]).toEqual({ item: 1, success: true, value: 1 });
    expect(results[1]).toEqual({ item: 2, success: false, error: new Error('test error') });
    expect(results[2]).toEqual({ item: 3, success: true, value: 3 });
  });

  it('should fallback to one worker for invalid concurrency', async () => {
    const processed: number[] = [];

    await processPool(
      [1, 2, 3],
      async (item) => {
        processed.push(item);
      },
      0,
    );

    expect(processed).toEqual([1, 2, 3]);
  });
});

describe('processStream', () => {
  it('should report every item through onResult', async () => {
    const results: Array<PoolResult<number, number>> = [];

    await processStream(fromArray([1, 2, 3]), async (item) => item + 10, 2, (result) =>
      results.push(result),
    );

    expect(
      results
        .map((result) => (result.success ? result.value : -1))
        .sort((a, b) => a - b),
    ).toEqual([11, 12, 13]);
  });

  it('should respect max concurrency', async () => {
    let activeTasks = 0;
    let maxActive = 0;

    await processStream(
      fromArray([1, 2, 3, 4, 5, 6, 7]),
      async () => {
        activeTasks++;
        maxActive = Math.max(maxActive, activeTasks);
        await new Promise((resolve) => setTimeout(resolve, 5));
        activeTasks--;
      },
      3,
    );

    expect(maxActive).toBe(3);
  });

  it('should report handler errors without stopping', async () => {
    const failures: string[] = [];
    let successes = 0;

    await processStream(
      fromArray(['a', 'b', 'c']),
      async (item) => {
        if (item === 'b') {
          throw new Error(`failed ${item}`);
        }
        return item;
      },
      1,
      (result) => {
        if (result.success) {
          successes++;
        } else {
          failures.push(result.error.message);
        }
      },
    );

    expect(successes).toBe(2);
    expect(failures).toEqual(['failed b']);
  });

  it('should stop pulling items once aborted', async () => {
    const controller = new AbortController();
    const started: number[] = [];

    await processStream(
      fromArray([1, 2, 3, 4]),
      async (item) => {
        started.push(item);
        if (item === 2) {
          controller.abort();
        }
      },
      1,
      () => {},
      controller.signal,
    );

    expect(started).toEqual([1, 2]);
  });
});
