import { describe, it, expect, vi } from 'vitest';
import { fromCallback } from '../../../src/utils/stream.js';

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

describe('fromCallback()', () => {
  it('should deliver queued and later items in order', async () => {
    const stream = fromCallback<number>();
    stream.push(1);
    stream.push(2);
    setTimeout(() => {
      stream.push(3);
      stream.done();
    }, 5);

    await expect(collect(stream.iterable)).resolves.toEqual([1, 2, 3]);
  });

  it('should surface an error after the queued items', async () => {
    const stream = fromCallback<number>();
    stream.push(1);
    stream.error(new Error('dropped'));

    const seen: number[] = [];
    await expect((async () => {
      for await (const n of stream.iterable) seen.push(n);
    })()).rejects.toThrow('dropped');
    expect(seen).toEqual([1]);
  });

  it('should call onReturn when the consumer stops early', async () => {
    const onReturn = vi.fn();
    const stream = fromCallback<number>(onReturn);
    stream.push(1);
    stream.push(2);

    for await (const n of stream.iterable) {
      if (n === 1) break;
    }

    expect(onReturn).toHaveBeenCalledTimes(1);
  });

  it('should ignore pushes after done', async () => {
    const stream = fromCallback<string>();
    stream.done();
    stream.push('late');

    await expect(collect(stream.iterable)).resolves.toEqual([]);
  });
});
