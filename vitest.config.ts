import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@rest-operations/core': fileURLToPath(new URL('./libs/rest-operation-core/src/index.ts', import.meta.url)),
      '@rest-operations/lro': fileURLToPath(new URL('./packages/rest-operation-lro/src/index.ts', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['libs/**/src/**/*.test.ts', 'packages/**/src/**/*.test.ts'],
  },
});
