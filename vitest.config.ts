import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20000,
    // Suites share the working directory for fixture folders
    fileParallelism: false,
  },
});
