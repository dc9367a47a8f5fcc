import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup-env.ts'],
    clearMocks: true,
    restoreMocks: true,
    // Supervisor specs bind real loopback listeners and wait on shutdown deadlines.
    testTimeout: 15_000,
  },
});
