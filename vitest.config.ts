import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    testTimeout: 60000,
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      exclude: ['**/node_modules/**', '**/dist/**', '**/tests/**', 'vitest.config.ts']
    }
  }
});
