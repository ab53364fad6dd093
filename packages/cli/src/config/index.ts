/**
 * Configuration exports
 */

export * from './schema.js';
export * from './defaults.js';
export * from './validation.js';
export * from './loader.js';
