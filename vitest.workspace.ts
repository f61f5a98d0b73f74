import { defineWorkspace } from 'vitest/config';

/**
 * Vitest workspace configuration for the modgraph monorepo.
 * Runs the tests of every package with a single command.
 */
export default defineWorkspace([
  // Core package
  {
    extends: './vitest.config.ts',
    test: {
      name: 'modgraph-core',
      root: './packages/core',
      include: ['src/**/*.{test,spec}.ts'],
    },
  },

  // CLI package
  {
    extends: './vitest.config.ts',
    test: {
      name: 'modgraph-cli',
      root: './packages/cli',
      include: ['src/**/*.{test,spec}.ts'],
    },
  },
]);
