import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const source = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'tests/**/*.test.ts'],
    testTimeout: 15_000,
  },
  resolve: {
    alias: {
      '@history-injector/core': source('core'),
      '@history-injector/pipeline': source('pipeline'),
      '@history-injector/service': source('service'),
    },
  },
});
