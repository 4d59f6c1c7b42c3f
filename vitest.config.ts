import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));
const packages = ['utils', 'protocol', 'config', 'sdk'];

export default defineConfig({
  resolve: {
    alias: [
      // Subpath patterns must come before the bare package entries
      ...packages.map((name) => ({
        find: new RegExp(`^@gwlink/${name}/(.+)$`),
        replacement: path.resolve(root, `./packages/${name}/src/$1.ts`),
      })),
      ...packages.map((name) => ({
        find: `@gwlink/${name}`,
        replacement: path.resolve(root, `./packages/${name}/src/index.ts`),
      })),
    ],
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.test.ts', 'packages/*/src/__fixtures__/**'],
    },
  },
});
