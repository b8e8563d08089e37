import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const workspace = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '*.config.ts'],
    },
  },
  resolve: {
    alias: {
      '@brrealty/contracts': workspace('contracts'),
      '@brrealty/logger': workspace('logger'),
      '@brrealty/dataset-cache': workspace('dataset-cache'),
      '@brrealty/source-adapters': workspace('source-adapters'),
      '@brrealty/acquisition': workspace('acquisition'),
    },
  },
});
