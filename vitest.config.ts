import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    pool: 'forks',
    globals: true,
    include: ['test/**/*.test.ts'],
  },
});
