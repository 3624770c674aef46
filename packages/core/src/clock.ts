import { performance } from 'node:perf_hooks';

/** Monotonic time source in milliseconds. */
export type Clock = () => number;

export const monotonicClock: Clock = () => performance.now();
