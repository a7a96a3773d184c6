import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    // tree-sitter is a native addon; keep it out of worker threads
    pool: 'forks',
  },
});
