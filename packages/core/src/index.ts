/**
 * @setmetrics/core
 *
 * Errors, logging, configuration and the diagnostic channel shared by the
 * set-similarity packages.
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Logging and configuration
export * from './logger.js';
export * from './config.js';

// Validation schemas
export * from './validation/index.js';

// Diagnostics
export * from './diagnostics.js';
