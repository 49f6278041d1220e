import { defineConfig } from 'tsup'

export default defineConfig({
  // Single entry: engine + presentation helpers + types
  entry: { index: 'src/index.ts' },
  format: ['esm', 'cjs'],
  dts: true,
  sourcemap: false,
  splitting: false,
  treeshake: true,
  target: 'es2022',
  outDir: 'dist/bundle',
  clean: true,
  external: ['pino'],
})
