import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'statforge',
    environment: 'node',
    include: ['packages/**/*.test.ts', 'apps/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
