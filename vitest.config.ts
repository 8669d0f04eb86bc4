import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    watch: false,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Process tests spawn real node children
    testTimeout: 20000,
  },
});
