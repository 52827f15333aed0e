import { defineConfig } from 'vitest/config';

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // No retries - surface issues immediately
    retry: 0,
    fileParallelism: !isCI,
    // property-based suites run longer than unit tests
    testTimeout: isCI ? 30000 : 10000,
    env: {
      TEST_SEED: '424242',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
