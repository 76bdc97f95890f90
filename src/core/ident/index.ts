/**
 * Identifier style engine barrel file.
 */
export * from './styles.js';
export * from './bundles.js';
