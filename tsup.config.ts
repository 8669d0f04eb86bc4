import { defineConfig } from 'tsup';
import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';

const PackageJsonSchema = z.object({
  dependencies: z.record(z.string()).optional(),
  peerDependencies: z.record(z.string()).optional(),
  devDependencies: z.record(z.string()).optional(),
});

const packageJson = PackageJsonSchema.parse(
  JSON.parse(readFileSync(join(process.cwd(), 'package.json'), 'utf-8')),
);

// Every declared package stays external, dev dependencies included, so
// nothing gets bundled into dist
const allExternals = Array.from(
  new Set([
    ...Object.keys(packageJson.dependencies ?? {}),
    ...Object.keys(packageJson.peerDependencies ?? {}),
    ...Object.keys(packageJson.devDependencies ?? {}),
  ]),
).sort();

export default defineConfig({
  entry: ['src/index.ts'],
  outDir: 'dist',
  format: ['cjs', 'esm'],
  dts: true,
  splitting: false,
  sourcemap: true,
  clean: true,
  external: allExternals,
});
