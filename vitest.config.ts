import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Tests swap process.env.HOME; keep files from racing each other.
    fileParallelism: false,
    testTimeout: 30_000,
  },
});
