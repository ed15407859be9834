import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    // Integration tests run through vitest.integration.config.ts
    exclude: ['**/node_modules/**', '**/dist/**', '**/tests/integration/**'],
    testTimeout: 10000,
    pool: 'threads',
  },
});
