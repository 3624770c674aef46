import { BufferedSink } from './buffered-sink.js';
import { validateLoggerEnv } from './env.schema.js';
import { initLogger, type Sink } from './logger.js';
import { ConsoleSink } from './sinks/console.js';

/**
 * Configure the global logger from LOGGER_* environment variables.
 * Console output is buffered onto the next macrotask, and skipped under
 * NODE_ENV=test.
 */
export function initLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): void {
  const config = validateLoggerEnv(env);
  const sinks: Sink[] = [];

  if (config.LOGGER_CONSOLE_ENABLED && config.NODE_ENV !== 'test') {
    const consoleSink = new ConsoleSink({ color: config.LOGGER_CONSOLE_COLOR });
    sinks.push(new BufferedSink(consoleSink, { maxBuffer: config.LOGGER_MAX_BUFFER }));
  }

  initLogger({ level: config.LOGGER_LOG_LEVEL, sinks });
}
