import { defineConfig } from 'vitest/config';

/**
 * Unit tests cover the scoring core and each experiment module in isolation;
 * integration tests run a full sweep over the sample experiment in data/.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80
      },
      exclude: [
        'tests/**',
        'dist/**',
        'src/main.ts',
        '**/*.config.ts',
        '**/*.d.ts'
      ]
    },
    testTimeout: 10000,
    hookTimeout: 10000,
    setupFiles: ['./tests/setup.ts'],
    include: [
      'tests/unit/**/*.test.ts',
      'tests/integration/**/*.test.ts'
    ]
  }
});
