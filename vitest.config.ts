import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['apps/*/src/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**', '**/node_modules/**'],
    globals: true,
    environment: 'node',
    restoreMocks: true,
    unstubEnvs: true,
    // PBKDF2 at the minimum iteration count still takes a moment per call
    testTimeout: 30_000,
  },
});
