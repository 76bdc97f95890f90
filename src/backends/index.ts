/**
 * Bundled backends.
 */
export * from './shared.js';
export * from './cpp.js';
export * from './objc.js';
export * from './swift-bridging.js';
export * from './yaml.js';
