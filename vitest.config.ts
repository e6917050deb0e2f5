import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    projects: ['packages/shared/vitest.config.ts', 'packages/core/vitest.config.ts'],
  },
});
