/**
 * roffsmith - build man pages as a document model and render them to ROFF
 *
 * Main entry point for the library.
 * Exports all public APIs and utilities.
 */

// Document model
export * from './document/index.js';

// Renderer / escaper
export * from './renderer/index.js';

// man(7) layer
export * from './man/index.js';

// Semantic documents, as the `semantic` namespace
export * as semantic from './semantic/index.js';

// Page descriptions
export * from './page/index.js';

// Output
export * from './output/index.js';

// Errors
export * from './errors/index.js';

// Config
export * from './config/index.js';

// CLI
export * from './cli/index.js';
