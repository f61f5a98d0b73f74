/**
 * modgraph-cli - Command-line interface for modgraph
 *
 * Exports the program factory, commands and reporters for programmatic use.
 */

export { VERSION } from 'modgraph-core';
export { createProgram } from './program.js';
export * from './commands/index.js';
export * from './reporters/index.js';
