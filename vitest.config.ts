import path from 'node:path';
import { defineConfig } from 'vitest/config';

const pkg = (name: string) => path.resolve(__dirname, 'packages', name, 'src', 'index.ts');

export default defineConfig({
  resolve: {
    alias: {
      '@treedump/shared': pkg('shared'),
      '@treedump/repo': pkg('repo'),
      '@treedump/core': pkg('core'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['**/*.test.ts', 'packages/cli/src/index.ts'],
    },
  },
});
