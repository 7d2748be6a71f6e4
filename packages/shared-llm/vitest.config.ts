/**
 * Workspace-level Vitest config for @parts-assistant/shared-llm
 *
 * WHY: The root config's include patterns are relative and don't resolve
 *      when CWD is this directory.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    passWithNoTests: false,
  },
});
