import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['server/tests/**/*.test.ts', 'web/tests/**/*.test.ts'],
    testTimeout: 10000,
    env: { LOG_LEVEL: 'error' },
  },
});
