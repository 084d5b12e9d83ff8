import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  clean: true,
  sourcemap: true,
  splitting: false,
  treeshake: true,
  minify: false,
  platform: 'node',
  target: 'node20',
  outDir: 'dist',
  // Workspace packages export TypeScript sources; inline them with their JSON data.
  noExternal: [/^@scanprobe\//],
  banner: {
    js: '#!/usr/bin/env node',
  },
});
