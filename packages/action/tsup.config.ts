import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  dts: false,
  splitting: false,
  sourcemap: true,
  clean: true,
  // The review package ships TypeScript sources, so it is bundled in
  noExternal: ['@pr-critic/review'],
  banner: {
    js: `
process.on('uncaughtException', (err) => {
  console.error('[pr-critic] uncaught:', err.message);
  console.error(err.stack);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error('[pr-critic] unhandled rejection:', reason);
  process.exit(1);
});
`,
  },
});
