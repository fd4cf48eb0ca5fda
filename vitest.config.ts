import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@scopewise/router': fileURLToPath(new URL('./packages/router/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'tests/**/*.test.ts'],
    environment: 'node',
    env: {
      SCOPEWISE_LOG_LEVEL: 'error',
    },
  },
});
