/* eslint-disable @typescript-eslint/no-empty-function -- acceptable in tests */
import { initLogger, type LogEntry } from '@progresskit/logger';
import { afterEach, describe, expect, it } from 'vitest';

import { ProgressEmitter } from '../progress-emitter.js';
import { UpdateType, type ProgressUpdate } from '../progress-update.js';

import { captureError, expectValue, FakeClock } from './test-utils.js';

async function collect(stream: AsyncIterable<ProgressUpdate>): Promise<ProgressUpdate[]> {
  const updates: ProgressUpdate[] = [];
  for await (const update of stream) {
    updates.push(update);
  }
  return updates;
}

const createEmitter = (total: number | null = 10, label?: string) =>
  new ProgressEmitter({ total, label, throttleIntervalMs: 0, clock: new FakeClock().read });

describe('ProgressEmitter.stream', () => {
  afterEach(() => {
    initLogger({ sinks: [] });
  });

  it('yields updates in order and finishes after COMPLETED', async () => {
    const emitter = createEmitter(3);
    const collected = collect(emitter.stream());

    emitter.update(1);
    emitter.update(1);
    emitter.complete();

    const updates = await collected;
    expect(updates.map((u) => u.updateType)).toEqual([UpdateType.STARTED, UpdateType.PROGRESS, UpdateType.COMPLETED]);
    expect(updates.map((u) => u.state.current)).toEqual([1, 2, 3]);
    expect(emitter.consumerCount).toBe(0);
  });

  it('ignores anything queued after COMPLETED', async () => {
    const emitter = createEmitter(5);
    const collected = collect(emitter.stream());

    emitter.complete();
    emitter.update(-2, { force: true });

    const updates = await collected;
    expect(updates.map((u) => u.state.current)).toEqual([5]);
  });

  it('registers its consumer only when iteration starts', async () => {
    const emitter = createEmitter(10);
    const stream = emitter.stream();

    expect(emitter.consumerCount).toBe(0);
    emitter.update(1);

    const next = stream.next();
    expect(emitter.consumerCount).toBe(1);

    emitter.update(1, { force: true });
    const result = await next;

    expect(expectValue(result).state.current).toBe(2);

    await stream.return(undefined);
    expect(emitter.consumerCount).toBe(0);
  });

  it('suspends until the next update arrives', async () => {
    const emitter = createEmitter(10);
    const stream = emitter.stream();
    let settled = false;
    const pending = stream.next().then((result) => {
      settled = true;
      return result;
    });

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(settled).toBe(false);

    emitter.update(4);
    const result = await pending;

    expect(settled).toBe(true);
    expect(expectValue(result).delta).toBe(4);
    await stream.return(undefined);
  });

  it('drops the oldest queued update when the buffer is full', async () => {
    const entries: LogEntry[] = [];
    initLogger({ level: 'debug', sinks: [{ write: (entry) => entries.push(entry), flush: () => {} }] });
    const emitter = createEmitter(10, 'Pages');
    const stream = emitter.stream({ bufferSize: 2 });
    const first = stream.next();

    emitter.update(1);
    emitter.update(1);
    emitter.update(1);
    emitter.update(1);
    emitter.complete();

    const currents: number[] = [];
    currents.push(expectValue(await first).state.current);
    for await (const update of stream) {
      currents.push(update.state.current);
    }

    expect(currents).toEqual([1, 4, 10]);
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      category: 'progress-emitter',
      context: { dropped: 2, label: 'Pages' },
      level: 'debug',
      msg: 'Stream dropped updates on overflow',
    });
  });

  it('unregisters when the loop breaks early', async () => {
    const emitter = createEmitter(10);
    const seen: number[] = [];
    const consumed = (async () => {
      for await (const update of emitter.stream()) {
        seen.push(update.state.current);
        break;
      }
    })();

    emitter.update(3);
    await consumed;

    expect(seen).toEqual([3]);
    expect(emitter.consumerCount).toBe(0);
    expect(() => emitter.update(1)).not.toThrow();
  });

  it('gives concurrent streams independent queues', async () => {
    const emitter = createEmitter(2);
    const a = collect(emitter.stream());
    const b = collect(emitter.stream({ bufferSize: 1 }));

    expect(emitter.consumerCount).toBe(2);

    emitter.update(1);
    emitter.complete();

    const [fromA, fromB] = await Promise.all([a, b]);
    expect(fromA.map((u) => u.state.current)).toEqual([1, 2]);
    expect(fromB.map((u) => u.state.current)).toEqual([1, 2]);
    expect(emitter.consumerCount).toBe(0);
  });

  it('relays only delivered notifications', async () => {
    const emitter = new ProgressEmitter({ total: 10, throttleIntervalMs: 100, clock: new FakeClock().read });
    const collected = collect(emitter.stream());

    emitter.update(1);
    emitter.update(1);
    emitter.update(1);
    emitter.complete();

    const updates = await collected;
    expect(updates.map((u) => u.updateType)).toEqual([UpdateType.STARTED, UpdateType.COMPLETED]);
  });

  it.each([0, -1, 1.5])('rejects bufferSize %s before iteration', (bufferSize) => {
    const emitter = createEmitter();

    expect(captureError(() => emitter.stream({ bufferSize }))).toMatchObject({
      message: `bufferSize must be a positive integer (got ${bufferSize})`,
      violation: 'INVALID_OPTIONS',
    });
    expect(emitter.consumerCount).toBe(0);
  });
});
