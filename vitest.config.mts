import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    // Include patterns
    include: [
      'packages/**/__tests__/**/*.test.ts',
      'apps/**/__tests__/**/*.test.ts',
    ],

    // Exclude patterns
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/.{idea,git,cache,output,temp}/**',
    ],

    // Loading is CPU-bound and side-effect free; threads are fine
    pool: 'threads',
    fileParallelism: true,

    testTimeout: 30000,
    hookTimeout: 30000,

    reporters: ['default'],

    watch: false,

    // ===================================================================
    // MOCKING & STUBBING
    // ===================================================================

    mockReset: true,        // Reset mocks between tests
    restoreMocks: true,     // Restore original implementations
    clearMocks: true,       // Clear mock history

    retry: 0,
    bail: 0,
  },
});
