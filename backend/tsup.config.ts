import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    'handlers/api': 'src/handlers/api.ts',
  },
  format: ['esm'],
  target: 'node20',
  platform: 'node',
  sourcemap: true,
  clean: true,
  dts: false, // Lambda bundle only
  // Provided by the Lambda Node.js runtime
  external: ['@aws-sdk/client-s3', '@aws-sdk/client-ssm'],
  noExternal: ['@tempscore/shared'],
  minify: false,
  splitting: false,
});
