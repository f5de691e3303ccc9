import { describe, it, expect } from 'vitest';
import { createAsyncChannel } from './async-channel';

async function drain<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const values: T[] = [];
  for await (const value of iterable) {
    values.push(value);
  }
  return values;
}

describe('createAsyncChannel', () => {
  it('should deliver buffered values in order and end on close', async () => {
    const channel = createAsyncChannel<number>();
    channel.push(1);
    channel.push(2);
    channel.close();

    expect(await drain(channel)).toEqual([1, 2]);
  });

  it('should hand values straight to a waiting consumer', async () => {
    const channel = createAsyncChannel<string>();
    const drained = drain(channel);

    channel.push('a');
    await Promise.resolve();
    channel.push('b');
    channel.close();

    expect(await drained).toEqual(['a', 'b']);
    expect(channel.size).toBe(0);
  });

  it('should ignore pushes after close', () => {
    const channel = createAsyncChannel<number>();
    channel.close();
    channel.push(1);

    expect(channel.closed).toBe(true);
    expect(channel.size).toBe(0);
  });

  it('should reject a waiting consumer on failure', async () => {
    const channel = createAsyncChannel<number>();
    const drained = drain(channel);

    channel.fail(new Error('listing crashed'));

    await expect(drained).rejects.toThrow('listing crashed');
  });

  it('should deliver buffered values before the failure', async () => {
    const channel = createAsyncChannel<number>();
    channel.push(7);
    channel.fail(new Error('late failure'));
    const iterator = channel[Symbol.asyncIterator]();

    expect(await iterator.next()).toEqual({ value: 7, done: false });
    await expect(iterator.next()).rejects.toThrow('late failure');
  });

  it('should keep order across a long backlog', async () => {
    const channel = createAsyncChannel<number>();
    const expected = Array.from({ length: 3000 }, (_, i) => i);
    for (const value of expected) {
      channel.push(value);
    }
    channel.close();

    expect(await drain(channel)).toEqual(expected);
  });
});
