/**
 * templatize - turn an existing project into a parameterized template.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Placeholder syntax
export * from './core/placeholder.js';

// Case shapes
export * from './core/case-shape/index.js';

// Strategies
export * from './core/strategies/index.js';

// Tree transformation
export * from './core/transform/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
