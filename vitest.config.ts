import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/unit/**/*.test.ts', 'packages/*/tests/integration/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 15000,
  },
  resolve: {
    alias: {
      '@tickflow/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      '@tickflow/blocks': fileURLToPath(new URL('./packages/blocks/src/index.ts', import.meta.url)),
    },
  },
});
