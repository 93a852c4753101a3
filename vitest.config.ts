import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      TABBIT_LOG_LEVEL: 'silent',
      TABBIT_DRAW_WORKER_THREADS: '0',
    },
  },
});
