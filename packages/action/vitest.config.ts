import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'action',
    globals: false,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts'], // top-level await run()
    },
  },
});

