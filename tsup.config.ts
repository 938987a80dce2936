import { defineConfig } from 'tsup';

export default defineConfig({
  entry: { index: 'src/index.ts' },
  format: ['esm'],
  target: 'node20',
  external: ['better-sqlite3', 'express', 'multer'],
  banner: {
    js: '#!/usr/bin/env node',
  },
  clean: true,
  splitting: false,
});
