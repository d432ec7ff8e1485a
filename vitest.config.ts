import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'disaster-loss-report',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    environment: 'node',
    pool: 'forks',
  },
});
