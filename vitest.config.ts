import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // Workspace packages export built output by default; tests run the sources.
    conditions: ['source'],
  },
  test: {
    include: ['packages/*/test/**/*.test.ts', 'modules/*/*/test/**/*.test.ts'],
    environment: 'node',
  },
});
