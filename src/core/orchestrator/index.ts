/**
 * Orchestrator barrel file.
 */
export * from './orchestrator.js';
