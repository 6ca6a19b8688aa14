import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'layout-engine',
    environment: 'node',
    include: ['packages/**/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
