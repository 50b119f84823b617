import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['shared/src/**/__tests__/**/*.test.ts', 'server/src/**/__tests__/**/*.test.ts'],
    testTimeout: 10000,
  },
});
