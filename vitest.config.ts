import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    // Test environment
    environment: 'node',

    // Test patterns
    include: [
      'test/**/*.test.ts',
      'test/**/*.spec.ts'
    ],
    exclude: [
      'node_modules',
      'dist'
    ],

    testTimeout: 10000,
    hookTimeout: 10000,

    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent'
    },

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      reportsDirectory: './coverage',
      exclude: [
        'node_modules/**',
        'dist/**',
        'test/**',
        '**/*.test.ts',
        '**/*.spec.ts',
        'src/index.ts',
        'src/types/**',
        'src/config/**'
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80
      }
    },

    watch: false
  }
});
