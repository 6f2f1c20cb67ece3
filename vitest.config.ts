import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // The project compiles to CommonJS, so at runtime `mustache` resolves to
    // its `require` build; use the same build under the test runner.
    alias: [{ find: /^mustache$/, replacement: 'mustache/mustache.js' }],
  },
  test: {
    environment: 'node',
    include: ['src/tests/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
