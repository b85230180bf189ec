import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    // Integration tests bind loopback ports and wait on real timers.
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
});
