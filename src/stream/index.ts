/**
 * Stream entrypoint: lazy single-item computations and their settled items.
 * @module
 */
export { emptyItem, errorItem, extract, valueItem } from './item.js';
export type { Item } from './item.js';
export { fetchBoth, observeBoth } from './parallel.js';
export { Single } from './single.js';
export type { BackoffRetryOptions, Emitter, Producer } from './single.js';
