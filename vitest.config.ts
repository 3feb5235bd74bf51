import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@social-api/shared': fileURLToPath(new URL('./modules/shared/src/index.ts', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['tests/specs/**/*.spec.ts'],
    setupFiles: ['tests/setup.ts'],
    testTimeout: 20000,
  },
});
