import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'h3-to-geo-boundary',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 10_000,
    pool: 'forks',
    globals: true,
    environment: 'node',
  },
});
