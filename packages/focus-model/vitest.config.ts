/**
 * Vitest Configuration
 *
 * Unit tests only: fetch is stubbed, FITS files live in temp directories.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'focus-model',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['src/__tests__/setup.ts'],
    testTimeout: 5_000,
    hookTimeout: 5_000,
    pool: 'forks',
    globals: true,
    environment: 'node',
    retry: 0,
  },
});
