/**
 * sexpfmt - a formatter for Scheme, Lisp and other S-expression sources.
 * Library exports barrel file.
 */

// Pipeline
export * from './core/scanner/index.js';
export * from './core/parser/index.js';
export * from './core/document/index.js';
export * from './core/layout/index.js';
export * from './core/pipeline/index.js';

// Orchestration
export * from './core/config/index.js';
export * from './core/files/index.js';
export * from './core/runner/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
