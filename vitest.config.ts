import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20_000,
    pool: 'forks',
    poolOptions: {
      forks: { singleFork: true }, // SQLite isn't thread-safe
    },
    env: {
      LOG_LEVEL: 'error',
    },
  },
});
