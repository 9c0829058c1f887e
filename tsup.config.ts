import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['cjs', 'esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  splitting: false,
  minify: false,
  // zod stays a runtime dependency of the consumer
  external: ['zod'],
  esbuildOptions(options) {
    options.platform = 'neutral';
  },
});
