/**
 * layergate: architecture-conformance gate for layered source trees.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Source model
export * from './core/model/index.js';

// Syntax adapters
export * from './adapters/index.js';

// Rules
export * from './core/rules/index.js';

// Documentation hygiene
export * from './core/docs/index.js';

// Stages and report
export * from './core/gate/index.js';
export * from './core/report/index.js';

// Scaffold
export * from './core/scaffold/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
