/**
 * File emission barrel file.
 */
export * from './indent-writer.js';
export * from './session.js';
export * from './file-emitter.js';
