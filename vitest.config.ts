import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['src/testkit/setup.ts'],
    // Tests share process-wide state (env vars, console spies, the logger quiet flag).
    fileParallelism: false,
    pool: 'threads',
    maxWorkers: 1,
    testTimeout: 30_000,
  },
});
