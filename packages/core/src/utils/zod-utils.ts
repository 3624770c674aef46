import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { ZodIssue, ZodType, ZodTypeDef } from 'zod';

/**
 * Parse `input` with `schema`, reporting only the first issue through
 * `toError`. Validation here is fail-fast: callers surface one violation.
 */
export function parseFirstIssue<T, E>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  input: unknown,
  toError: (issue: ZodIssue | undefined) => E
): Result<T, E> {
  const parsed = schema.safeParse(input);
  return parsed.success ? ok(parsed.data) : err(toError(parsed.error.issues[0]));
}
