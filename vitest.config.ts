import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./apps/lectern/src', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['apps/*/src/**/*.test.ts'],
    setupFiles: ['apps/lectern/src/test/setup.ts'],
    testTimeout: 10000,
  },
});
