import { defineConfig } from 'tsup';

export default defineConfig([
  // Library entry, CommonJS with .d.ts
  {
    entry: {
      index: 'src/index.ts',
      themes: 'src/themes/index.ts',
    },
    format: ['cjs'],
    dts: true,
    sourcemap: true,
    clean: true,
    external: ['@xterm/xterm'],
  },
  // CLI entry
  {
    entry: { cli: 'src/cli.ts' },
    format: ['cjs'],
    sourcemap: true,
    banner: { js: '#!/usr/bin/env node' },
    external: ['@xterm/xterm'],
  },
]);
