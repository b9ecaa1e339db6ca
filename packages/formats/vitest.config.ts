import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    name: 'formats',
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      FORMATSTREAMS_LOG_LEVEL: 'silent',
    },
  },
  resolve: {
    alias: {
      '@formatstreams/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
});
