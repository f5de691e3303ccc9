export type PoolResult<T, R> =
  | { item: T; success: true; value: R }
  | { item: T; success: false; error: Error };

function normalizeConcurrency(maxConcurrency: number): number {
  const requested = Number.isFinite(maxConcurrency)
    ? Math.floor(maxConcurrency)
    : 1;
  return Math.max(1, requested);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run `handler` over a fixed list with at most `maxConcurrency` in flight.
 * Results keep the input order; a rejected handler does not stop the pool.
 */
export async function processPool<T, R>(
  items: readonly T[],
  handler: (item: T) => Promise<R>,
  maxConcurrency: number,
): Promise<Array<PoolResult<T, R>>> {
  if (items.length === 0) {
    return [];
  }

  const concurrency = Math.min(normalizeConcurrency(maxConcurrency), items.length);
  let nextIndex = 0;
  const results: Array<PoolResult<T, R>> = [];

  const worker = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const currentIndex = nextIndex++;
      const item = items[currentIndex];
      try {
        const value = await handler(item);
        results[currentIndex] = { item, success: true, value };
      } catch (error) {
        results[currentIndex] = { item, success: false, error: toError(error) };
      }
    }
  };

  await Promise.all(Array.from({ length: concurrency }, () => worker()));
  return results;
}

/**
 * Run `handler` over an async stream with a fixed pool of workers sharing
 * one iterator. Items are pulled only when a worker is free, so a fast
 * producer queues work on its own side instead of opening more slots.
 * Stops pulling once `signal` aborts; items already started run to the end
 * of their handler. Workers call `next()` concurrently, so `items` must
 * queue overlapping calls the way async generators do.
 */
export async function processStream<T, R>(
  items: AsyncIterable<T>,
  handler: (item: T) => Promise<R>,
  maxConcurrency: number,
  onResult: (result: PoolResult<T, R>) => void = () => {},
  signal?: AbortSignal,
): Promise<void> {
  const iterator = items[Symbol.asyncIterator]();
  let exhausted = false;

  const worker = async (): Promise<void> => {
    while (!exhausted && !signal?.aborted) {
      const next = await iterator.next();
      if (next.done) {
        exhausted = true;
        return;
      }
      try {
        const value = await handler(next.value);
        onResult({ item: next.value, success: true, value });
      } catch (error) {
        onResult({ item: next.value, success: false, error: toError(error) });
      }
    }
  };

  await Promise.all(
    Array.from({ length: normalizeConcurrency(maxConcurrency) }, () => worker()),
  );
}
