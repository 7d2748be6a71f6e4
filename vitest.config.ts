/**
 * FILE PURPOSE: Root Vitest config for the monorepo
 *
 * HOW: Discovers tests under every workspace package; packages can override
 *      with their own config when run from their directory.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/**/tests/**/*.test.ts'],
    passWithNoTests: false,
    coverage: {
      provider: 'v8',
      include: ['packages/**/src/**/*.ts'],
      exclude: ['**/index.ts'],
    },
  },
});
