/**
 * @setmetrics/similarity
 *
 * Set similarity and distance measures behind a shared validation gate.
 */

export * from './similarity/index.js';
export * from './validation/index.js';
export * from './utils/index.js';
export * from './types/index.js';
