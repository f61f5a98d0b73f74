import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

/**
 * Shared Vitest configuration. Workspace packages import each other by
 * package name; the alias points those imports at TypeScript sources so
 * tests never need a build first.
 */
export default defineConfig({
  resolve: {
    alias: {
      'modgraph-core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    testTimeout: 20_000,
  },
});
