import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = fileURLToPath(new URL('.', import.meta.url));
const alias = (dir: string) => path.resolve(root, dir);

// One suite; every test runs in-process in well under a second
export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    environment: 'node',
    globals: true,
    reporters: ['default'],
  },
  resolve: {
    alias: {
      '@core': alias('src/core'),
      '@host': alias('src/host'),
      '@utils': alias('src/utils'),
      '@test': alias('tests'),
    },
  },
});
