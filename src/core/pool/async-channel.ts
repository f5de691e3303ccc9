/**
 * Unbounded single-consumer queue bridging a push-based producer and a
 * `for await` consumer. Producers never wait on the consumer.
 */
export interface AsyncChannel<T> extends AsyncIterable<T> {
  push(value: T): void;
  close(): void;
  fail(error: Error): void;
  readonly size: number;
  readonly closed: boolean;
}

export function createAsyncChannel<T>(): AsyncChannel<T> {
  const buffer: T[] = [];
  let head = 0;
  let waiting: {
    resolve: (result: IteratorResult<T>) => void;
    reject: (error: Error) => void;
  } | null = null;
  let closed = false;
  let failure: Error | null = null;

  const push = (value: T): void => {
    if (closed) {
      return;
    }
    if (waiting) {
      const { resolve } = waiting;
      waiting = null;
      resolve({ value, done: false });
      return;
    }
    buffer.push(value);
  };

  const take = (): T => {
    const value = buffer[head];
    head++;
    // Compact occasionally so a long-lived backlog does not grow forever
    if (head >= 1024 && head * 2 >= buffer.length) {
      buffer.splice(0, head);
      head = 0;
    }
    return value;
  };

  const settleWaiter = (): void => {
    if (!waiting) {
      return;
    }
    const pending = waiting;
    waiting = null;
    if (failure) {
      pending.reject(failure);
    } else {
      pending.resolve({ value: undefined, done: true });
    }
  };

  const close = (): void => {
    closed = true;
    settleWaiter();
  };

  const fail = (error: Error): void => {
    failure = error;
    closed = true;
    settleWaiter();
  };

  const next = (): Promise<IteratorResult<T>> => {
    if (head < buffer.length) {
      return Promise.resolve({ value: take(), done: false });
    }
    if (failure) {
      return Promise.reject(failure);
    }
    if (closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => {
      waiting = { resolve, reject };
    });
  };

  return {
    push,
    close,
    fail,
    get size() {
      return buffer.length - head;
    },
    get closed() {
      return closed;
    },
    [Symbol.asyncIterator]: () => ({ next }),
  };
}
