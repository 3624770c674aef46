import type { ProgressState } from './progress-state.js';

export const UpdateType = {
  /** First transition away from current = 0. */
  STARTED: 'started',
  PROGRESS: 'progress',
  TOTAL_CHANGED: 'total_changed',
  /** Terminal. */
  COMPLETED: 'completed',
  /** Reserved for consumer-side signaling; the emitter never produces it. */
  ERROR: 'error',
} as const;

export type UpdateType = (typeof UpdateType)[keyof typeof UpdateType];

/** Kinds delivered regardless of the throttle window. */
const ALWAYS_NOTIFY: ReadonlySet<UpdateType> = new Set<UpdateType>([
  UpdateType.STARTED,
  UpdateType.TOTAL_CHANGED,
  UpdateType.COMPLETED,
]);

export function isBoundaryUpdate(updateType: UpdateType): boolean {
  return ALWAYS_NOTIFY.has(updateType);
}

export interface ProgressUpdate {
  readonly state: ProgressState;
  /** Signed size of the change that produced this update. */
  readonly delta: number;
  readonly updateType: UpdateType;
}

export function createProgressUpdate(state: ProgressState, delta: number, updateType: UpdateType): ProgressUpdate {
  return Object.freeze({ state, delta, updateType });
}
