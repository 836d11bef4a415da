/**
 * hookline service utilities
 * Shared building blocks for hookline services
 */

export * from './types.js';
export * from './logger.js';
export * from './database.js';
export * from './retry.js';
export * from './validation.js';
export * from './security.js';
