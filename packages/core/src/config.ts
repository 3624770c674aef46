import { z } from 'zod';

const nonNegativeMs = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val: string) => Number(val))
    .pipe(z.number().finite().nonnegative());

const progressEnvSchema = z.object({
  PROGRESS_LOG_INTERVAL_MS: nonNegativeMs('5000'),
  PROGRESS_STREAM_BUFFER_SIZE: z
    .string()
    .default('100')
    .transform((val: string) => Number(val))
    .pipe(z.number().int().positive()),
  PROGRESS_THROTTLE_INTERVAL_MS: nonNegativeMs('100'),
});

type ProgressEnv = z.infer<typeof progressEnvSchema>;

export interface ProgressConfig {
  /** Default minimum gap between non-boundary notifications. */
  throttleIntervalMs: number;
  /** Default queue capacity of `ProgressEmitter.stream()`. */
  streamBufferSize: number;
  /** Default interval of LoggingProgressConsumer. */
  logIntervalMs: number;
}

let cached: ProgressConfig | undefined;

/**
 * @throws Error listing every invalid PROGRESS_* variable
 */
export function parseProgressEnv(env: NodeJS.ProcessEnv = process.env): ProgressConfig {
  const result = progressEnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Progress environment validation failed:\n${errors}`);
  }
  return toConfig(result.data);
}

/**
 * Read on first access, then cached for the life of the process.
 */
export function getProgressConfig(): ProgressConfig {
  cached ??= parseProgressEnv();
  return cached;
}

export function resetProgressConfig(): void {
  cached = undefined;
}

function toConfig(env: ProgressEnv): ProgressConfig {
  return {
    logIntervalMs: env.PROGRESS_LOG_INTERVAL_MS,
    streamBufferSize: env.PROGRESS_STREAM_BUFFER_SIZE,
    throttleIntervalMs: env.PROGRESS_THROTTLE_INTERVAL_MS,
  };
}
