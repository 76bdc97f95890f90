/**
 * bridgegen - cross-language bridge code generation.
 * Main library exports barrel file.
 */

// Identifier styles
export * from './core/ident/index.js';

// Configuration
export * from './core/config/index.js';

// Declarations
export * from './core/ast/index.js';

// File emission
export * from './core/emit/index.js';

// Generator abstraction
export * from './core/generator/index.js';

// Orchestrator
export * from './core/orchestrator/index.js';

// Backends
export * from './backends/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
