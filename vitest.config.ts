import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['src/test/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'lcov'],
      reportsDirectory: 'coverage',
      exclude: [
        'src/index.ts',
        'src/tools/**',
        'dist/**',
        'vitest.config.*',
        '__tests__/helpers/**',
      ]
    },
    include: ['__tests__/**/*.test.ts'],
  }
});
