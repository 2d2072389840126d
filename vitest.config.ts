import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['backend/tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
