/**
 * Declaration model barrel file.
 */
export * from './types.js';
export * from './type-expr.js';
export * from './loader.js';
