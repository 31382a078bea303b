import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@': path.resolve(rootDir, '.'),
    },
  },
  test: {
    environment: 'node',
    globals: false,
    include: ['modules/**/tests/**/*.test.ts', 'modules/**/tests/**/*.spec.ts'],
  },
});
