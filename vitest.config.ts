import { defineConfig } from 'vitest/config';

/**
 * Everything runs in-process against app.inject(); no database or network,
 * so files run in parallel.
 */
export default defineConfig({
  test: {
    globals: true,
    testTimeout: 15000,
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    // setup-api.ts disables bearer token auth and provides a test secret
    setupFiles: ['./tests/setup-api.ts'],
  },
});
