import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'feed-validator',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 30000,
    pool: 'forks',
    setupFiles: ['./src/__tests__/setup.ts'],
  },
});
