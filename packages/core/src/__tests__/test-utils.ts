import type { Result } from 'neverthrow';

import type { Clock } from '../clock.js';
import type { ProgressConsumer } from '../progress-consumer.js';
import type { ProgressState } from '../progress-state.js';
import type { ProgressUpdate, UpdateType } from '../progress-update.js';

/**
 * Asserts that a Result is Ok and returns its value.
 */
export function assertOk<T, E>(result: Result<T, E>): T {
  if (result.isErr()) {
    throw new Error(`Expected Result to be Ok, but got Err: ${String(result.error)}`);
  }
  return result.value;
}

/**
 * Asserts that a Result is Err and returns its error.
 */
export function assertErr<T, E>(result: Result<T, E>): E {
  if (result.isOk()) {
    throw new Error(`Expected Result to be Err, but got Ok: ${String(result.value)}`);
  }
  return result.error;
}

/**
 * Runs `fn` and returns what it threw.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

/**
 * Returns the yielded value of an iterator step, failing on `done`.
 */
export function expectValue<T>(result: IteratorResult<T, unknown>): T {
  if (result.done) {
    throw new Error('Expected a yielded value, but the iterator is done');
  }
  return result.value;
}

/** Manually advanced monotonic clock. */
export class FakeClock {
  private nowMs = 1_000;

  readonly read: Clock = () => this.nowMs;

  advance(ms: number): void {
    this.nowMs += ms;
  }
}

export class RecordingConsumer implements ProgressConsumer {
  readonly updates: ProgressUpdate[] = [];
  readonly completions: ProgressState[] = [];

  get types(): UpdateType[] {
    return this.updates.map((u) => u.updateType);
  }

  get currents(): number[] {
    return this.updates.map((u) => u.state.current);
  }

  onProgress(update: ProgressUpdate): void {
    this.updates.push(update);
  }

  onComplete(state: ProgressState): void {
    this.completions.push(state);
  }
}
