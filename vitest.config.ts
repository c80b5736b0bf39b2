import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@permgraph/core': fileURLToPath(new URL('./packages/permgraph-core/src/index.ts', import.meta.url)),
    },
  },
});
