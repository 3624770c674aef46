import type { ProgressState } from './progress-state.js';
import type { ProgressUpdate } from './progress-update.js';

/**
 * Receiver of progress notifications (renderer, logger, callback adapter, ...).
 *
 * Implementations may throw; the emitter logs the failure and carries on with
 * the next consumer.
 */
export interface ProgressConsumer {
  onProgress(update: ProgressUpdate): void;
  /** Called after `onProgress` for COMPLETED updates. */
  onComplete(state: ProgressState): void;
}
