import path from 'path';
import swc from 'unplugin-swc';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@gridsearch/shared': path.resolve(__dirname, 'packages/shared/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    setupFiles: ['apps/api/src/test-setup.ts'],
    environment: 'node',
    pool: 'forks',
  },
  // Nest DI and TypeORM read decorator metadata, which esbuild does not emit
  plugins: [swc.vite({ module: { type: 'es6' } })],
});
