import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./packages/adapter/src', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
    },
    include: ['packages/*/src/**/*.test.ts'],
  },
});
