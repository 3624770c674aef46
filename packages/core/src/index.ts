export { ProgressEmitter, type ChildEmitterOptions, type NotifyOptions, type StreamOptions } from './progress-emitter.js';
export { validateEmitterOptions, type ProgressEmitterOptions, type ResolvedEmitterOptions } from './emitter-options.js';
export { ProgressState, MAX_LABEL_LENGTH, labelLength, type ProgressStateInput } from './progress-state.js';
export { UpdateType, createProgressUpdate, isBoundaryUpdate, type ProgressUpdate } from './progress-update.js';
export type { ProgressConsumer } from './progress-consumer.js';
export { CallbackProgressConsumer, type ProgressCallback } from './consumers/callback-consumer.js';
export {
  LoggingProgressConsumer,
  formatProgress,
  type LoggingProgressConsumerOptions,
} from './consumers/logging-consumer.js';
export { BoundedAsyncQueue } from './update-queue.js';
export { getProgressConfig, parseProgressEnv, resetProgressConfig, type ProgressConfig } from './config.js';
export { monotonicClock, type Clock } from './clock.js';
export {
  ProgressError,
  ProgressValidationError,
  isProgressValidationError,
  type ProgressErrorContext,
  type ProgressViolation,
} from './errors/index.js';
export { parseFirstIssue } from './utils/zod-utils.js';
