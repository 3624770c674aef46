import type { NotifyOptions } from '@progresskit/core';

import { getCurrentProgress } from './context.js';

/**
 * Drive the ambient emitter from code that does not hold a reference to it.
 * Every helper is a no-op outside `runWithProgress`; validation errors from
 * the emitter still propagate.
 */
export const progress = {
  advance: (increment = 1, options?: NotifyOptions) => getCurrentProgress()?.update(increment, options),

  set: (value: number, options?: NotifyOptions) => getCurrentProgress()?.setCurrent(value, options),

  total: (total: number | null) => getCurrentProgress()?.updateTotal(total),

  complete: () => getCurrentProgress()?.complete(),
};
