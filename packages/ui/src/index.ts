export { runWithProgress, getCurrentProgress } from './context.js';
export { progress } from './helpers.js';
export { ClackProgressConsumer, type ClackProgressConsumerOptions } from './renderers/clack.js';
