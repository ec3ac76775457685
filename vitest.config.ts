import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      DB_PATH: ':memory:',
      LOG_LEVEL: 'silent',
      IO_TIMEOUT_MS: '2000',
      INDEXER_API_URL: '',
      INDEXER_API_KEY: '',
    },
  },
});
