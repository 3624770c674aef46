import { getLogger } from '@progresskit/logger';

import type { ProgressConsumer } from '../progress-consumer.js';
import type { ProgressState } from '../progress-state.js';
import type { ProgressUpdate } from '../progress-update.js';

const logger = getLogger('progress-callback');

export type ProgressCallback = (current: number, total: number | null) => void;

/**
 * Adapts a plain `(current, total)` callback. Callback errors are logged
 * here so they never reach the emitter.
 */
export class CallbackProgressConsumer implements ProgressConsumer {
  constructor(private readonly callback: ProgressCallback) {}

  onProgress(update: ProgressUpdate): void {
    this.invoke(update.state, 'progress');
  }

  onComplete(state: ProgressState): void {
    this.invoke(state, 'complete');
  }

  private invoke(state: ProgressState, phase: 'progress' | 'complete'): void {
    try {
      this.callback(state.current, state.total);
    } catch (error) {
      logger.error({ error, phase }, 'Progress callback failed');
    }
  }
}
