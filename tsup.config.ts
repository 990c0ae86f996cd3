import { defineConfig } from 'tsup'

export default defineConfig([
  // Library: dual CJS/ESM with declarations
  {
    entry: { index: 'src/index.ts' },
    format: ['cjs', 'esm'],
    dts: true,
    clean: true,
    outDir: 'dist',
    splitting: false,
    sourcemap: true,
    target: 'node20',
    platform: 'node',
    outExtension({ format }) {
      return { js: format === 'cjs' ? '.cjs' : '.mjs' }
    },
  },
  // moon-almanac executable; series tables are inlined by the bundler
  {
    entry: { 'cli/index': 'src/cli/index.ts' },
    format: ['cjs'],
    dts: false,
    outDir: 'dist',
    splitting: false,
    sourcemap: false,
    target: 'node20',
    platform: 'node',
    banner: {
      js: '#!/usr/bin/env node',
    },
    outExtension() {
      return { js: '.cjs' }
    },
  },
])
