import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@glimpse/core': source('core'),
      '@glimpse/adapters': source('adapters'),
      '@glimpse/runtime': source('runtime'),
      '@glimpse/api': source('api'),
      '@glimpse/testing': source('testing')
    }
  },
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    testTimeout: 20_000
  }
});
