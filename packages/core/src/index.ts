/**
 * modgraph-core - Dependency graph engine for Python source trees
 *
 * This package provides:
 * - Scanner: file discovery and concurrent import extraction
 * - Extractors: language front ends producing raw imports
 * - Module graph: registry, resolver, immutable dependency graph
 * - Analyses: cycles, coupling metrics, orphans, dependency trees
 * - Config: `.modgraph.json` loading and validation
 */

// Export version
export const VERSION = '0.1.0';

// Module graph exports
export * from './module-graph/index.js';

// Scanner exports
export * from './scanner/index.js';

// Extractor exports
export * from './extractors/index.js';

// Config exports
export * from './config/index.js';

// Error exports
export * from './errors/index.js';

// Logging exports
export * from './logging/index.js';
