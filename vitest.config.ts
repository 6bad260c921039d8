import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

const isCI = process.env.CI === 'true';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: 'node',

    // Test files for every package in the monorepo
    include: ['packages/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // No retries: sampling is seeded, a failure must reproduce
    retry: 0,
    fileParallelism: !isCI,
    testTimeout: isCI ? 30000 : 10000,

    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
      ],
    },

    env: {
      NODE_ENV: 'test',
      NO_COLOR: '1',
    },
  },
});
