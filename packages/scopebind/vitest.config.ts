import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    target: 'es2022',
  },
  test: {
    globals: true,
    environment: 'node',

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['tests/**', 'benchmarks/**', '**/*.d.ts'],
    },

    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    // Teardown tests wait on real timers (dispose wait, borrow polling)
    testTimeout: 10000,
    hookTimeout: 10000,

    clearMocks: true,
    restoreMocks: true,
  },
});
