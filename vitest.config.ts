import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*_test.ts', 'tests/**/*_test.ts'],
    exclude: ['**/dist/**', '**/node_modules/**'],
  },
});
