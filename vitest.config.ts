import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    pool: 'forks',
    include: [
      'packages/*/__tests__/**/*.test.ts',
      'packages/*/src/**/__tests__/**/*.test.ts',
      'packages/*/tests/**/*.test.ts',
    ],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 20000,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
