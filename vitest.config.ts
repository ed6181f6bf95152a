import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // suites that drive a real git repository in a temp dir
    testTimeout: 20000,
  },
});
