import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  resolve: {
    // Workspace packages are consumed from source; no build step before tests
    alias: [
      {
        find: /^@recstat\/core$/,
        replacement: fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      },
      {
        find: /^@recstat\/core\/testing$/,
        replacement: fileURLToPath(new URL('./packages/core/src/testing/index.ts', import.meta.url)),
      },
    ],
  },
  test: {
    globals: true,
    environment: 'node',

    include: [
      'packages/**/__tests__/**/*.test.ts',
      'apps/**/__tests__/**/*.test.ts',
    ],

    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],

    pool: 'forks',
    fileParallelism: true,

    testTimeout: 30000,
    hookTimeout: 30000,

    reporters: ['default'],
    watch: false,

    mockReset: true,
    restoreMocks: true,
    clearMocks: true,
  },
});
