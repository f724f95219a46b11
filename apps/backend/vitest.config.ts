import { defineConfig } from 'vitest/config';

// Logs are JSON lines on stdout; keep test output readable unless asked otherwise.
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'error';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['tests/**/*.test.ts'],
    testTimeout: 20_000,
    hookTimeout: 20_000,
    isolate: true,
  },
});
