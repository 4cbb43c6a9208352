import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for pushline.
 */
export default defineConfig({
  test: {
    root: '.',
    include: ['tests/**/*.test.ts'],
  },
});
