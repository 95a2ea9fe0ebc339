import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: false,
  clean: true,
  sourcemap: true,
  target: 'es2022',
  outDir: 'dist',
  splitting: false,
  // Prompt templates are read at run time, so they ship next to the bundle
  onSuccess: 'mkdir -p dist/prompts && cp -r src/prompts/templates dist/prompts/',
  external: [
    // All dependencies stay external for the library build
    '@anthropic-ai/sdk',
    'chalk',
    'fuzzball',
    'handlebars',
    'openai',
    'strip-ansi',
    'zod',
    'zod-to-json-schema'
  ]
});
