import { describe, expect, it } from 'vitest';

import { BoundedAsyncQueue } from '../update-queue.js';

interface Tick {
  n: number;
}

describe('BoundedAsyncQueue', () => {
  it('returns queued items in FIFO order', async () => {
    const queue = new BoundedAsyncQueue<Tick>(3);
    queue.push({ n: 1 });
    queue.push({ n: 2 });

    expect(queue.size).toBe(2);
    expect(await queue.shift()).toEqual({ n: 1 });
    expect(await queue.shift()).toEqual({ n: 2 });
    expect(queue.size).toBe(0);
  });

  it('drops the oldest item when full', async () => {
    const queue = new BoundedAsyncQueue<Tick>(2);
    queue.push({ n: 1 });
    queue.push({ n: 2 });
    queue.push({ n: 3 });

    expect(queue.dropped).toBe(1);
    expect(await queue.shift()).toEqual({ n: 2 });
    expect(await queue.shift()).toEqual({ n: 3 });
  });

  it('hands a pushed item straight to a waiting reader', async () => {
    const queue = new BoundedAsyncQueue<Tick>(1);
    const pending = queue.shift();

    queue.push({ n: 7 });

    expect(queue.size).toBe(0);
    expect(await pending).toEqual({ n: 7 });
  });

  it('serves waiting readers in call order', async () => {
    const queue = new BoundedAsyncQueue<Tick>(1);
    const first = queue.shift();
    const second = queue.shift();

    queue.push({ n: 1 });
    queue.push({ n: 2 });

    expect(await Promise.all([first, second])).toEqual([{ n: 1 }, { n: 2 }]);
    expect(queue.dropped).toBe(0);
  });

  it.each([0, -3, 2.5])('rejects capacity %s', (capacity) => {
    expect(() => new BoundedAsyncQueue<Tick>(capacity)).toThrow(RangeError);
  });
});
