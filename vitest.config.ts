import { defineConfig } from 'vitest/config';

/**
 * Single root configuration for every workspace package.
 * Browsers are never launched from tests; harness tests run on FakePageDriver.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',
    pool: 'forks',
    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // No retries - surface issues immediately
    retry: 0,
    fileParallelism: !isCI,
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,
    teardownTimeout: 5000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/test-utils/**',
      ],
    },

    env: {
      NODE_ENV: 'test',
    },
  },
});
