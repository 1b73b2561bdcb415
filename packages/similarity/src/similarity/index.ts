export * from './set-similarity.js';
export * from './compare.js';
