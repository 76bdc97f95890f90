/**
 * Configuration barrel file.
 */
export * from './schema.js';
export * from './model.js';
export * from './loader.js';
