import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  resolve: {
    alias: {
      '@template-extract/shared': path.resolve(__dirname, 'shared'),
    },
  },
  test: {
    environment: 'node',
    include: ['backend/src/**/__tests__/**/*.test.ts'],
    fileParallelism: false,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
