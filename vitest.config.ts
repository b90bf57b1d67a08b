import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    exclude: ['test-fixtures/**'],
    // Child processes are real; allow slow CI runners
    testTimeout: process.env.CI ? 60000 : 30000,
    hookTimeout: process.env.CI ? 60000 : 30000,
    env: {
      ENTRY_REMOVE_LOG_LEVEL: 'silent',
    },
    reporters: ['default'],
  },
});
