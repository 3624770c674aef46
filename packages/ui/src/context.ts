import { AsyncLocalStorage } from 'node:async_hooks';

import type { ProgressEmitter } from '@progresskit/core';

const progressContext = new AsyncLocalStorage<ProgressEmitter>();

/**
 * Run `fn` with `emitter` as the ambient progress target for everything it
 * awaits. Nested calls shadow the outer emitter.
 */
export function runWithProgress<T>(emitter: ProgressEmitter, fn: () => Promise<T>): Promise<T> {
  return progressContext.run(emitter, fn);
}

export function getCurrentProgress(): ProgressEmitter | undefined {
  return progressContext.getStore();
}
