import { getLogger, type Logger } from '@progresskit/logger';

import { monotonicClock, type Clock } from './clock.js';
import { getProgressConfig } from './config.js';
import { validateEmitterOptions, type ProgressEmitterOptions } from './emitter-options.js';
import { ProgressValidationError } from './errors/index.js';
import type { ProgressConsumer } from './progress-consumer.js';
import { ProgressState } from './progress-state.js';
import { createProgressUpdate, isBoundaryUpdate, UpdateType, type ProgressUpdate } from './progress-update.js';
import { BoundedAsyncQueue } from './update-queue.js';


/**
 * Added before flooring the weighted parent value so binary rounding
 * (weights 0.1/0.2 at 10% and 100% summing to 69.99999999999999) does not
 * lose an item. The result is still clamped to the parent total.
 */
const FLOOR_EPSILON = 1e-9;

export interface NotifyOptions {
  /** Deliver even inside the throttle window. */
  force?: boolean | undefined;
}

export interface ChildEmitterOptions {
  total?: number | null | undefined;
  /** Relative share of the parent's progress. Must be > 0. Default 1. */
  weight?: number | undefined;
  label?: string | undefined;
}

export interface StreamOptions {
  /** Queue capacity; the oldest update is dropped when full. */
  bufferSize?: number | undefined;
}

interface ChildLink {
  emitter: ProgressEmitter;
  weight: number;
}

function assertInteger(value: number, name: string): void {
  if (!Number.isInteger(value)) {
    throw new ProgressValidationError('NOT_AN_INTEGER', `${name} must be an integer (got ${value})`);
  }
}

/**
 * Owns a single progress timeline and notifies its consumers.
 *
 * Driving calls are synchronous. Each produces at most one notification,
 * which is suppressed when it falls inside the throttle window unless it is
 * forced or a boundary event (STARTED, TOTAL_CHANGED, COMPLETED).
 *
 * Consumers are called in registration order. A throwing consumer is logged
 * and skipped; the caller of the driving operation never sees its error.
 *
 * @example
 * ```typescript
 * const emitter = new ProgressEmitter({ total: pages.length, label: 'Extracting pages' });
 * emitter.addConsumer(new LoggingProgressConsumer());
 *
 * for (const page of pages) {
 *   await extract(page);
 *   emitter.update();
 * }
 * emitter.complete();
 * ```
 */
export class ProgressEmitter {
  private currentValue = 0;
  private totalValue: number | null;
  private readonly labelValue: string | undefined;
  private readonly metadata: Record<string, unknown>;
  private readonly throttleMs: number;
  private readonly clock: Clock;
  /** `progress-emitter` logger, bound to this emitter's label when it has one. */
  private readonly log: Logger;
  private lastUpdateTime: number | undefined;
  private readonly consumers: ProgressConsumer[] = [];
  private readonly childLinks: ChildLink[] = [];
  /** Set by the parent in createChild; runs after every regular consumer. */
  private notifyParent: (() => void) | undefined;

  /**
   * @throws ProgressValidationError for a negative or fractional total, a
   * negative throttle interval or a label over 100 characters
   */
  constructor(options: ProgressEmitterOptions = {}) {
    const resolved = validateEmitterOptions(options);
    if (resolved.isErr()) {
      throw resolved.error;
    }
    this.totalValue = resolved.value.total;
    this.labelValue = resolved.value.label;
    this.metadata = resolved.value.metadata;
    this.throttleMs = resolved.value.throttleIntervalMs;
    this.clock = options.clock ?? monotonicClock;
    const logger = getLogger('progress-emitter');
    this.log = this.labelValue === undefined ? logger : logger.child({ label: this.labelValue });
  }

  get current(): number {
    return this.currentValue;
  }

  get total(): number | null {
    return this.totalValue;
  }

  get label(): string | undefined {
    return this.labelValue;
  }

  get throttleIntervalMs(): number {
    return this.throttleMs;
  }

  /** Fresh snapshot on every access. */
  get state(): ProgressState {
    return this.snapshot(this.clock());
  }

  get children(): readonly ProgressEmitter[] {
    return this.childLinks.map((link) => link.emitter);
  }

  get consumerCount(): number {
    return this.consumers.length;
  }

  /**
   * Advance by `increment` (may be negative). No mutation on failure.
   *
   * @throws ProgressValidationError when the result is negative or exceeds total
   */
  update(increment = 1, options: NotifyOptions = {}): void {
    assertInteger(increment, 'increment');
    const next = this.currentValue + increment;
    if (next < 0) {
      throw new ProgressValidationError(
        'NEGATIVE_CURRENT',
        `update would make current negative (${this.currentValue} + ${increment} < 0)`
      );
    }
    if (this.totalValue !== null && next > this.totalValue) {
      throw new ProgressValidationError(
        'EXCEEDS_TOTAL',
        `update would exceed total (${this.currentValue} + ${increment} > ${this.totalValue})`
      );
    }

    const started = this.currentValue === 0 && increment > 0;
    this.currentValue = next;
    this.notify(started ? UpdateType.STARTED : UpdateType.PROGRESS, increment, options.force ?? false);
  }

  /**
   * Jump to an absolute value. Moving back to 0 is reported as STARTED.
   *
   * @throws ProgressValidationError when value is negative or exceeds total
   */
  setCurrent(value: number, options: NotifyOptions = {}): void {
    assertInteger(value, 'value');
    if (value < 0) {
      throw new ProgressValidationError('NEGATIVE_CURRENT', `value must be non-negative (got ${value})`);
    }
    if (this.totalValue !== null && value > this.totalValue) {
      throw new ProgressValidationError('EXCEEDS_TOTAL', `value cannot exceed total (${value} > ${this.totalValue})`);
    }

    const delta = value - this.currentValue;
    this.currentValue = value;
    this.notify(value === 0 ? UpdateType.STARTED : UpdateType.PROGRESS, delta, options.force ?? false);
  }

  /**
   * Redefine the total, or pass `null` to switch to indeterminate progress.
   * Always notifies.
   *
   * @throws ProgressValidationError when newTotal is negative or below current
   */
  updateTotal(newTotal: number | null): void {
    if (newTotal !== null) {
      assertInteger(newTotal, 'total');
      if (newTotal < 0) {
        throw new ProgressValidationError('NEGATIVE_TOTAL', `total must be non-negative (got ${newTotal})`);
      }
      if (newTotal < this.currentValue) {
        throw new ProgressValidationError(
          'TOTAL_BELOW_CURRENT',
          `new total cannot be less than current (${newTotal} < ${this.currentValue})`
        );
      }
    }

    this.totalValue = newTotal;
    this.notify(UpdateType.TOTAL_CHANGED, 0, true);
  }

  /**
   * Set current to total and deliver COMPLETED, then `onComplete`, to every
   * consumer. Calling it again delivers another COMPLETED.
   *
   * @throws ProgressValidationError when progress is indeterminate
   */
  complete(): void {
    if (this.totalValue === null) {
      throw new ProgressValidationError('INDETERMINATE_COMPLETION', 'cannot complete indeterminate progress');
    }

    this.currentValue = this.totalValue;
    this.notify(UpdateType.COMPLETED, 0, true);
  }

  addConsumer(consumer: ProgressConsumer): void {
    this.consumers.push(consumer);
  }

  /**
   * Remove the first registration of `consumer`.
   * @returns false when it was not registered
   */
  removeConsumer(consumer: ProgressConsumer): boolean {
    const index = this.consumers.indexOf(consumer);
    if (index < 0) {
      return false;
    }
    this.consumers.splice(index, 1);
    return true;
  }

  /**
   * Create a child whose completion fraction feeds this emitter's progress
   * in proportion to `weight`. The child shares this emitter's throttle
   * interval and clock.
   *
   * @throws ProgressValidationError when weight is not a positive number
   */
  createChild(options: ChildEmitterOptions = {}): ProgressEmitter {
    const weight = options.weight ?? 1;
    if (!Number.isFinite(weight) || weight <= 0) {
      throw new ProgressValidationError('NON_POSITIVE_WEIGHT', `weight must be positive (got ${weight})`);
    }

    const child = new ProgressEmitter({
      clock: this.clock,
      label: options.label,
      throttleIntervalMs: this.throttleMs,
      total: options.total,
    });
    this.childLinks.push({ emitter: child, weight });
    child.notifyParent = () => this.recomputeFromChildren();
    return child;
  }

  /**
   * Async view of this emitter's notifications. The relay consumer is
   * registered when iteration starts and removed after COMPLETED is yielded
   * or when the loop exits early.
   *
   * @throws ProgressValidationError when bufferSize is not a positive integer
   */
  stream(options: StreamOptions = {}): AsyncGenerator<ProgressUpdate, void, undefined> {
    const bufferSize = options.bufferSize ?? getProgressConfig().streamBufferSize;
    if (!Number.isInteger(bufferSize) || bufferSize < 1) {
      throw new ProgressValidationError('INVALID_OPTIONS', `bufferSize must be a positive integer (got ${bufferSize})`);
    }
    return this.relay(bufferSize);
  }

  private async *relay(bufferSize: number): AsyncGenerator<ProgressUpdate, void, undefined> {
    const queue = new BoundedAsyncQueue<ProgressUpdate>(bufferSize);
    const consumer: ProgressConsumer = {
      onProgress: (update) => queue.push(update),
      onComplete: () => {
        // COMPLETED was already queued by onProgress
      },
    };
    this.addConsumer(consumer);

    try {
      for (;;) {
        const update = await queue.shift();
        yield update;
        if (update.updateType === UpdateType.COMPLETED) {
          return;
        }
      }
    } finally {
      this.removeConsumer(consumer);
      if (queue.dropped > 0) {
        this.log.debug({ dropped: queue.dropped }, 'Stream dropped updates on overflow');
      }
    }
  }

  private snapshot(timestamp: number): ProgressState {
    return ProgressState.create({
      current: this.currentValue,
      label: this.labelValue,
      metadata: this.metadata,
      timestamp,
      total: this.totalValue,
    });
  }

  private notify(updateType: UpdateType, delta: number, force: boolean): void {
    const now = this.clock();
    const throttled =
      !force &&
      !isBoundaryUpdate(updateType) &&
      this.lastUpdateTime !== undefined &&
      now - this.lastUpdateTime < this.throttleMs;
    if (throttled) {
      return;
    }

    this.lastUpdateTime = now;
    this.dispatch(createProgressUpdate(this.snapshot(now), delta, updateType));
  }

  private dispatch(update: ProgressUpdate): void {
    // Copy so consumers added or removed during dispatch take effect next time
    for (const consumer of [...this.consumers]) {
      try {
        consumer.onProgress(update);
      } catch (error) {
        this.log.error(
          { consumer: consumer.constructor.name, error, updateType: update.updateType },
          'Progress consumer error'
        );
        continue;
      }

      if (update.updateType === UpdateType.COMPLETED) {
        try {
          consumer.onComplete(update.state);
        } catch (error) {
          this.log.error({ consumer: consumer.constructor.name, error }, 'Progress consumer error on complete');
        }
      }
    }

    this.notifyParent?.();
  }

  private recomputeFromChildren(): void {
    if (this.childLinks.length === 0 || this.totalValue === null || this.totalValue <= 0) {
      return;
    }

    const totalWeight = this.childLinks.reduce((sum, link) => sum + link.weight, 0);
    let weightedSum = 0;
    for (const { emitter, weight } of this.childLinks) {
      const childTotal = emitter.total;
      if (childTotal !== null && childTotal > 0) {
        weightedSum += (emitter.current / childTotal) * 100 * (weight / totalWeight);
      }
    }

    const next = Math.min(this.totalValue, Math.floor((weightedSum / 100) * this.totalValue + FLOOR_EPSILON));
    const delta = next - this.currentValue;
    this.currentValue = next;
    this.notify(UpdateType.PROGRESS, delta, false);
  }
}
