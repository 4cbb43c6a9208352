import { defineConfig } from 'vitest/config';

/**
 * Root Vitest configuration.
 *
 * Runs the tests of every workspace package in a single pass.
 */
export default defineConfig({
  test: {
    root: '.',
    include: ['packages/*/tests/**/*.test.ts'],
  },
});
