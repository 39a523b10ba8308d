import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['backend/src/**/*.test.ts', 'frontend/src/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      ENABLE_REDIS_CACHE: 'false',
      ENABLE_DB: 'false',
      ENABLE_QUEUE: 'false',
    },
    restoreMocks: true,
  },
});
