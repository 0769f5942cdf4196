import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/*/src/**/__tests__/**/*.test.ts'],
    setupFiles: ['apps/market-stream/src/__tests__/setup.ts'],
  },
});
