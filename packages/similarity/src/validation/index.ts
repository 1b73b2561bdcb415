export * from './validate-input.js';
export * from './element-class.js';
