import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Commands open the file the harness passes; this only guards the default path
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
