import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts', 'server/**/__tests__/**/*.test.ts', 'apps/web/src/**/__tests__/**/*.test.ts'],
  },
});
