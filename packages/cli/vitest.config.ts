import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@embedbatch/core': source('../core/src/index.ts'),
      '@embedbatch/openai': source('../openai/src/index.ts'),
      '@embedbatch/state-sequelize': source('../state-sequelize/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
