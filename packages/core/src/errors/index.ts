/**
 * Error hierarchy for the progress engine.
 *
 * Every engine failure is a local validation failure raised synchronously at
 * the call site. Nothing is clamped or coerced.
 */

export interface ProgressErrorContext {
  additionalContext?: Record<string, unknown> | undefined;
}

export abstract class ProgressError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'error' | 'warning';

  readonly timestamp: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: ProgressErrorContext) {
    super(message);
    this.timestamp = new Date().toISOString();
    this.context = context?.additionalContext;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      severity: this.severity,
      timestamp: this.timestamp,
    };
  }
}

export type ProgressViolation =
  | 'NEGATIVE_CURRENT'
  | 'NEGATIVE_TOTAL'
  | 'EXCEEDS_TOTAL'
  | 'LABEL_TOO_LONG'
  | 'NOT_AN_INTEGER'
  | 'TOTAL_BELOW_CURRENT'
  | 'INDETERMINATE_COMPLETION'
  | 'NON_POSITIVE_WEIGHT'
  | 'INVALID_OPTIONS';

/**
 * Bound violation, illegal transition or illegal composition.
 * `violation` names the invariant that was broken.
 */
export class ProgressValidationError extends ProgressError {
  readonly code = 'PROGRESS_VALIDATION_ERROR';
  readonly severity = 'error' as const;

  constructor(
    public readonly violation: ProgressViolation,
    message: string,
    context?: ProgressErrorContext
  ) {
    super(message, context);
  }

  override toJSON() {
    return { ...super.toJSON(), violation: this.violation };
  }
}

export function isProgressValidationError(error: unknown): error is ProgressValidationError {
  return error instanceof ProgressValidationError;
}
