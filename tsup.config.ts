import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['packages/index.ts'],
  format: ['esm'],
  dts: false,
  splitting: false,
  external: [
    'chevrotain',
    'sql-template-tag',
    'zod',
  ],
  outDir: 'dist',
});
