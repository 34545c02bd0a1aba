import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    // Retry-backoff and concurrency tests sleep for real
    testTimeout: 10000,
    globals: true,
  },
});
