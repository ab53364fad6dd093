/**
 * Error exports
 */

export * from './cli-errors.js';
export * from './handler.js';
