/**
 * appforge - project-aware code generation engine.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Template Store and Catalog
export * from './core/store/index.js';
export * from './core/catalog/index.js';

// Analysis and conflicts
export * from './core/analyzer/index.js';
export * from './core/conflicts/index.js';

// Resolution, rendering and placement
export * from './core/resolver/index.js';
export * from './core/render/index.js';
export * from './core/placement/index.js';

// Planning and writing
export * from './core/plan/index.js';
export * from './core/executor/index.js';
export * from './core/pipeline/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
