import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    pool: 'forks',
    testTimeout: 15_000,
    env: {
      OPENAI_API_KEY: 'test-key-for-unit-tests',
      TODOIST_API_KEY: 'test-token-for-unit-tests',
    },
  },
});
