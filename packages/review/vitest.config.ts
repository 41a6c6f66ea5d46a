import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'review',
    globals: false,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/test-helpers.ts'],
    },
  },
});
