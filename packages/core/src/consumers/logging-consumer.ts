import { getLogger, type Logger, type LogLevel } from '@progresskit/logger';

import { monotonicClock, type Clock } from '../clock.js';
import { getProgressConfig } from '../config.js';
import type { ProgressConsumer } from '../progress-consumer.js';
import type { ProgressState } from '../progress-state.js';
import type { ProgressUpdate } from '../progress-update.js';

export interface LoggingProgressConsumerOptions {
  logger?: Logger | undefined;
  level?: Exclude<LogLevel, 'trace'> | undefined;
  /** Minimum gap between progress lines. Completion is always logged. */
  logIntervalMs?: number | undefined;
  clock?: Clock | undefined;
}

/**
 * Writes progress to a category logger at a slower cadence than renderers,
 * e.g. `Progress: Transcribing - 30/120 (25.0%)`.
 */
export class LoggingProgressConsumer implements ProgressConsumer {
  private readonly logger: Logger;
  private readonly level: Exclude<LogLevel, 'trace'>;
  private readonly logIntervalMs: number;
  private readonly clock: Clock;
  private lastLogTime: number | undefined;

  constructor(options: LoggingProgressConsumerOptions = {}) {
    this.logger = options.logger ?? getLogger('progress');
    this.level = options.level ?? 'info';
    this.logIntervalMs = options.logIntervalMs ?? getProgressConfig().logIntervalMs;
    this.clock = options.clock ?? monotonicClock;
  }

  onProgress(update: ProgressUpdate): void {
    const now = this.clock();
    if (this.lastLogTime !== undefined && now - this.lastLogTime < this.logIntervalMs) {
      return;
    }
    this.lastLogTime = now;
    this.write(formatProgress(update.state));
  }

  onComplete(state: ProgressState): void {
    this.write(`Complete: ${state.label ?? 'Processing'} - ${state.current} items`);
  }

  private write(message: string): void {
    switch (this.level) {
      case 'debug':
        this.logger.debug(message);
        break;
      case 'info':
        this.logger.info(message);
        break;
      case 'warn':
        this.logger.warn(message);
        break;
      case 'error':
        this.logger.error(message);
        break;
    }
  }
}

export function formatProgress(state: ProgressState): string {
  const label = state.label ?? 'Processing';
  if (state.total === null) {
    return `Progress: ${label} - ${state.current} items`;
  }
  const percentage = (state.percentage ?? 0).toFixed(1);
  return `Progress: ${label} - ${state.current}/${state.total} (${percentage}%)`;
}
