import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // sharp and the filesystem fixtures make the pipeline tests slower than unit tests
    testTimeout: 20_000,
    coverage: {
      provider: 'v8',
      include: ['src/archive/**/*.ts'],
      exclude: ['src/archive/types/**', 'src/archive/__tests__/**'],
    },
  },
});
