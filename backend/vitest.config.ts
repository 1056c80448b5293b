import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    // Sets NODE_ENV/LOG_LEVEL/STORAGE_DRIVER before the logger module loads.
    setupFiles: ['test/setup-env.ts'],
    clearMocks: true,
    restoreMocks: true,
    testTimeout: 10_000,
  },
});
