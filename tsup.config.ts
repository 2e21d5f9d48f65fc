import { defineConfig } from 'tsup';
import { readFileSync } from 'fs';

const packageJson: { version: string } = JSON.parse(readFileSync('./package.json', 'utf-8'));

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  splitting: false,
  sourcemap: true,
  clean: true,
  minify: false,
  shims: true,
  platform: 'node',
  define: {
    '__PACKAGE_VERSION__': JSON.stringify(packageJson.version),
  },
});
