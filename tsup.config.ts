import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: false,
  clean: true,
  sourcemap: true,
  target: 'node20',
  outDir: 'dist',
  splitting: false,
  // Bundled so the language table JSON is inlined
  bundle: true,
  external: [
    'chalk',
    'commander',
    'fast-glob',
    'strip-ansi',
    'zod',
    'zod-to-json-schema'
  ]
});
