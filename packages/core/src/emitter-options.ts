import type { Result } from 'neverthrow';
import { z, type ZodIssue } from 'zod';

import type { Clock } from './clock.js';
import { getProgressConfig } from './config.js';
import { ProgressValidationError, type ProgressViolation } from './errors/index.js';
import { labelLength, MAX_LABEL_LENGTH } from './progress-state.js';
import { parseFirstIssue } from './utils/zod-utils.js';

export interface ProgressEmitterOptions {
  /** `null` or omitted for indeterminate progress. */
  total?: number | null | undefined;
  label?: string | undefined;
  /** Minimum gap between ordinary notifications; boundary events ignore it. */
  throttleIntervalMs?: number | undefined;
  clock?: Clock | undefined;
  metadata?: Record<string, unknown> | undefined;
}

const emitterOptionsSchema = z.object({
  label: z
    .string()
    .refine((label) => labelLength(label) <= MAX_LABEL_LENGTH, {
      message: `label too long (max ${MAX_LABEL_LENGTH} chars)`,
      params: { violation: 'LABEL_TOO_LONG' },
    })
    .optional(),
  metadata: z.record(z.unknown()).optional(),
  throttleIntervalMs: z
    .number()
    .finite({ message: 'throttle interval must be finite' })
    .nonnegative({ message: 'throttle interval must be non-negative' })
    .optional(),
  total: z
    .number()
    .int({ message: 'total must be an integer' })
    .nonnegative({ message: 'total must be non-negative' })
    .nullable()
    .optional(),
});

export interface ResolvedEmitterOptions {
  total: number | null;
  label: string | undefined;
  throttleIntervalMs: number;
  metadata: Record<string, unknown>;
}

function violationFor(issue: ZodIssue): ProgressViolation {
  switch (issue.path[0]) {
    case 'total':
      return issue.code === 'too_small' ? 'NEGATIVE_TOTAL' : 'NOT_AN_INTEGER';
    case 'label':
      return issue.code === 'custom' && issue.params?.['violation'] === 'LABEL_TOO_LONG'
        ? 'LABEL_TOO_LONG'
        : 'INVALID_OPTIONS';
    default:
      return 'INVALID_OPTIONS';
  }
}

function toValidationError(issue: ZodIssue | undefined): ProgressValidationError {
  if (!issue) {
    return new ProgressValidationError('INVALID_OPTIONS', 'invalid emitter options');
  }
  return new ProgressValidationError(violationFor(issue), issue.message, {
    additionalContext: { field: issue.path.join('.') },
  });
}

/**
 * Validate constructor options and fill in configured defaults.
 * Reports the first failing field.
 */
export function validateEmitterOptions(
  options: ProgressEmitterOptions
): Result<ResolvedEmitterOptions, ProgressValidationError> {
  return parseFirstIssue(emitterOptionsSchema, options, toValidationError).map((parsed) => ({
    label: parsed.label,
    metadata: parsed.metadata ?? {},
    throttleIntervalMs: parsed.throttleIntervalMs ?? getProgressConfig().throttleIntervalMs,
    total: parsed.total ?? null,
  }));
}
