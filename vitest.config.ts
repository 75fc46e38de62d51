import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    env: {
      DISCORD_TOKEN: 'test-token',
      DB_PATH: ':memory:',
      LOG_LEVEL: 'error',
    },
    testTimeout: 10000,
  },
});
