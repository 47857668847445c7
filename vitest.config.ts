import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // Tests run against sources; the package entry points at the build output.
    alias: {
      '@failscope/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    env: {
      DEBUG_MODE: 'true',
    },
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['dist/**', 'node_modules/**', 'packages/*/dist/**'],
  },
});
