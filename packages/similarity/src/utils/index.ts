export * from './set-operations.js';
export * from './tokenize.js';
