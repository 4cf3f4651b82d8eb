import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration
 * Unit tests live beside the sources; shared helpers and fakes live under tests/
 */
export default defineConfig({
  test: {
    globals: false, // Explicit imports (no global describe/it)
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['node_modules', 'dist', 'coverage'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'html'],
      reportsDirectory: './coverage',
      exclude: [
        '**/*.d.ts',
        '**/*.test.ts',
        '**/*.spec.ts',
        'src/cli.ts', // CLI entry point - exercised through the command modules
      ],
      thresholds: {
        lines: 70,
        functions: 70,
        branches: 70,
        statements: 70,
      },
    },

    // Setup files
    setupFiles: ['./tests/setup.ts'],

    testTimeout: 10000,

    // Clear mocks between tests
    clearMocks: true,
    mockReset: true,
    restoreMocks: true,
  },
});
