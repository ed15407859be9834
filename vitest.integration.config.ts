import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Only include integration tests
    include: ['**/tests/integration/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Integration tests touch the filesystem
    testTimeout: 30000,
    pool: 'threads',
  },
});
