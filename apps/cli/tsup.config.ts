import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['apps/cli/src/index.ts'],
  outDir: 'apps/cli/dist',
  format: ['esm'],
  target: 'node20',
  clean: true,
  shims: true,
  splitting: false,
  treeshake: true,
  noExternal: [/^@ledgerline\//],
  banner: {
    js: 'import { createRequire } from "module"; const require = createRequire(import.meta.url);',
  },
});
