import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    // tree-sitter's binding can only be loaded once per process, so every
    // test file runs in a fresh child process.
    pool: 'forks',
    isolate: true,
    testTimeout: 30000,
  },
});
