import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    env: {
      RUNTRAIL_LOG_LEVEL: 'silent',
    },
  },
});
