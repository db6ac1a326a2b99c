import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    // Sharp decoding and retry backoff can take a few seconds
    testTimeout: 30000,

    setupFiles: ['./tests/setup.ts'],

    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist', 'build'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['**/*.d.ts'],
    },

    globals: true,
  },
});
