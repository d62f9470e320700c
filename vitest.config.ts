import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: [
      'sdk/tests/**/*.test.ts',
      'packages/*/src/**/*.test.ts',
      'packages/*/test/**/*.test.ts',
    ],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Key generation and signing dominate the bridge suites
    testTimeout: 20_000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: 'coverage',
      exclude: ['coverage/**', 'dist/**', 'node_modules/**', '**/*.d.ts', '**/*.config.*', '**/test/**', '**/__tests__/**'],
    },
  },
});
