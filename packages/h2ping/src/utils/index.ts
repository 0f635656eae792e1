/**
 * Shared utilities
 */

export * from './hex.js';
export * from './logger.js';
