/**
 * @switchboard/core
 *
 * Core package exports: config loader, error classes, logger.
 */

// Configuration loader and schema
export * from './config/index.js';

// Utilities
export * from './utils/errors.js';
export * from './utils/logger.js';
