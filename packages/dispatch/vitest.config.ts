import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    target: 'es2022',
  },
  test: {
    // Use globals (describe, it, expect) without importing
    globals: true,

    // Test environment
    environment: 'node',

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov', 'json'],
      exclude: [
        'node_modules/**',
        'dist/**',
        'tests/**',
        'benchmarks/**',
        '**/*.test.ts',
        'vitest.config.ts',
        '**/*.d.ts',
      ],
      include: ['src/**/*.ts'],
      // Require 80% coverage
      thresholds: {
        statements: 80,
        branches: 80,
        functions: 80,
        lines: 80,
      },
    },

    // Test file patterns
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    // Behavior
    clearMocks: true,
    restoreMocks: true,
    mockReset: true,
  },
});
