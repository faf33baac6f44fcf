import { defineConfig, type Options } from 'tsup'

export default defineConfig(
  (cliOptions: Options): Options => ({
    target: 'es2022',
    treeshake: false,
    splitting: false,
    sourcemap: true,
    clean: true,
    dts: true,
    format: ['esm'],
    entry: ['src/index.ts'],
    outDir: 'dist',
    // Allows overriding via tsup CLI flags
    ...cliOptions,
  }),
)
