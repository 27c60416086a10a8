import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Main entry point (everything)
    index: 'src/index.ts',

    // =========================================================================
    // Granular entry points
    // =========================================================================
    match: 'src/match-entry.ts',
    'tagged-error': 'src/tagged-error-entry.ts',
    errors: 'src/errors-entry.ts',
    result: 'src/result.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: true,
});
