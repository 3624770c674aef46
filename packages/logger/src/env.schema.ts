import { z } from 'zod';

import { LOG_LEVELS } from './logger.js';

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((val: string) => val === 'true');

export const loggerEnvSchema = z.object({
  LOGGER_CONSOLE_COLOR: booleanFlag('false'),
  LOGGER_CONSOLE_ENABLED: booleanFlag('true'),
  LOGGER_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LOGGER_MAX_BUFFER: z.coerce.number().int().positive().default(1000),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

/**
 * @throws Error listing every invalid key
 */
export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const result = loggerEnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Logger environment validation failed:\n${errors}`);
  }
  return result.data;
}
