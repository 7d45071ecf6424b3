import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Force in-memory database for ALL tests
    env: {
      BRIDGE_DB_PATH: ':memory:',
      BRIDGE_LOG_LEVEL: 'silent'
    },
    globals: true,
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'json-summary'],
      reportsDirectory: './coverage'
    }
  }
});
