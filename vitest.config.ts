import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    reporters: ['default'],
    // PGlite boots a WebAssembly Postgres per test
    testTimeout: 30000,
  },
});
