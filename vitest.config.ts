import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./apps/server/sources', import.meta.url)),
    },
  },
  test: {
    include: ['apps/*/sources/**/*.spec.ts', 'packages/*/src/**/*.spec.ts'],
    environment: 'node',
    globals: false,
    testTimeout: 30_000,
    hookTimeout: 60_000,
  },
});
