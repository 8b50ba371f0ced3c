import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['cjs', 'esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  splitting: false,
  minify: false,
  // Node built-ins used by the file helpers stay external
  external: ['fs', 'fs/promises'],
  noExternal: [],
  esbuildOptions(options) {
    options.platform = 'node';
  },
});
