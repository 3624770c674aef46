import { err, ok, type Result } from 'neverthrow';

import { monotonicClock } from './clock.js';
import { ProgressValidationError } from './errors/index.js';

export const MAX_LABEL_LENGTH = 100;

/** Label length in code points, so astral characters count once. */
export function labelLength(label: string): number {
  return [...label].length;
}

export interface ProgressStateInput {
  current: number;
  /** `null` or omitted means indeterminate. */
  total?: number | null | undefined;
  label?: string | undefined;
  /** Monotonic milliseconds; defaults to now. */
  timestamp?: number | undefined;
  metadata?: Record<string, unknown> | undefined;
}

/**
 * Immutable progress snapshot.
 *
 * Validated once on creation: current is a non-negative integer, total (when
 * present) is a non-negative integer no smaller than current, and the label
 * is at most 100 characters.
 */
export class ProgressState {
  static tryCreate(input: ProgressStateInput): Result<ProgressState, ProgressValidationError> {
    const total = input.total ?? null;

    if (!Number.isInteger(input.current)) {
      return err(new ProgressValidationError('NOT_AN_INTEGER', `current must be an integer (got ${input.current})`));
    }
    if (input.current < 0) {
      return err(new ProgressValidationError('NEGATIVE_CURRENT', 'current must be non-negative'));
    }
    if (total !== null) {
      if (!Number.isInteger(total)) {
        return err(new ProgressValidationError('NOT_AN_INTEGER', `total must be an integer (got ${total})`));
      }
      if (total < 0) {
        return err(new ProgressValidationError('NEGATIVE_TOTAL', 'total must be non-negative'));
      }
      if (input.current > total) {
        return err(
          new ProgressValidationError('EXCEEDS_TOTAL', `current cannot exceed total (${input.current} > ${total})`)
        );
      }
    }
    const length = input.label === undefined ? 0 : labelLength(input.label);
    if (length > MAX_LABEL_LENGTH) {
      return err(
        new ProgressValidationError('LABEL_TOO_LONG', `label too long (max ${MAX_LABEL_LENGTH} chars)`, {
          additionalContext: { length },
        })
      );
    }

    return ok(
      new ProgressState(
        input.current,
        total,
        input.label,
        input.timestamp ?? monotonicClock(),
        Object.freeze({ ...input.metadata })
      )
    );
  }

  /**
   * @throws ProgressValidationError
   */
  static create(input: ProgressStateInput): ProgressState {
    const result = ProgressState.tryCreate(input);
    if (result.isErr()) {
      throw result.error;
    }
    return result.value;
  }

  private constructor(
    readonly current: number,
    readonly total: number | null,
    readonly label: string | undefined,
    readonly timestamp: number,
    readonly metadata: Readonly<Record<string, unknown>>
  ) {
    Object.freeze(this);
  }

  /** 0-100, `undefined` when indeterminate or when total is 0. */
  get percentage(): number | undefined {
    if (this.total === null || this.total === 0) {
      return undefined;
    }
    return (this.current / this.total) * 100;
  }

  get isIndeterminate(): boolean {
    return this.total === null;
  }

  get isComplete(): boolean {
    return this.total !== null && this.current === this.total;
  }

  get itemsRemaining(): number | undefined {
    return this.total === null ? undefined : this.total - this.current;
  }

  toJSON() {
    return {
      current: this.current,
      label: this.label,
      metadata: this.metadata,
      percentage: this.percentage,
      timestamp: this.timestamp,
      total: this.total,
    };
  }
}
