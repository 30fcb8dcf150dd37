import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // jsdom windows are heavy; keep the worker count low
    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks: 2,
        minForks: 1,
      },
    },
    fileParallelism: false,

    include: ['test/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
  },
});
