import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./test/setup.ts'],
    include: ['packages/**/src/**/__tests__/**/*.test.ts'],
    exclude: ['node_modules/', 'dist/', '**/node_modules/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'test/', 'dist/', '**/*.d.ts', '**/*.config.*'],
    },
  },
  resolve: {
    alias: {
      '@endsession/lib-core': path.resolve(root, 'packages/lib-core/src'),
      '@endsession/lib-pipeline': path.resolve(root, 'packages/lib-pipeline/src'),
      '@endsession/logout': path.resolve(root, 'packages/logout/src'),
    },
  },
});
