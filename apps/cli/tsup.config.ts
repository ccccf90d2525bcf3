import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  clean: true,
  bundle: true,
  splitting: false,
  treeshake: true,
  // Workspace packages export TypeScript sources; compile them into the bundle
  noExternal: [/^@aequi\//],
  banner: {
    js: '#!/usr/bin/env node',
  },
});
