import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // Worker threads are spawned from the test process itself.
    pool: 'forks',
    // Each pool test starts real threads through the tsx bootstrap.
    testTimeout: 60_000,
  },
});
