import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'layout-engine',
    environment: 'node',
    include: ['packages/layout-engine/**/src/**/*.test.ts', 'packages/layout-engine/**/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 10000,
  },
});
