import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  sourcemap: true,
  clean: true,
  target: 'node20',
  platform: 'node',
  // The core workspace package exports TypeScript sources; inline it.
  noExternal: ['@buildstat/core'],
  banner: { js: '#!/usr/bin/env node' },
});
