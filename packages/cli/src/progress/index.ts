/**
 * Progress output exports
 */

export * from './types.js';
export * from './formatters.js';
export * from './debug-output.js';
export * from './reporter.js';
