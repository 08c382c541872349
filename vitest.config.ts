import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/examples/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['**/__tests__/**', '**/__mocks__/**', 'src/cli/main.ts'],
    },
    testTimeout: 10000,
    restoreMocks: true,
    unstubGlobals: true,
  },
});
