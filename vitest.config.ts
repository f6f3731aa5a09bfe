import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      SCRIPTORIUM_LOG_LEVEL: 'silent',
    },
    testTimeout: 15000,
  },
});
