import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // Keep pino from opening a log file during the run
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
