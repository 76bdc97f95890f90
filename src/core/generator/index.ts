/**
 * Generator abstraction barrel file.
 */
export * from './backend.js';
export * from './render.js';
export * from './context.js';
