import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    testTimeout: 30000, // 30 seconds max per test
    hookTimeout: 30000, // 30 seconds max for beforeEach/afterEach
  },
  resolve: {
    alias: {
      '@rowcast/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
});
