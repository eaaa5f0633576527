import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: true,
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@jobscope/agents': path.resolve(root, 'agents/src/index.ts'),
      '@jobscope/core': path.resolve(root, 'packages/core/src/index.ts'),
      '@jobscope/db': path.resolve(root, 'packages/db/src/index.ts'),
      '@jobscope/llm': path.resolve(root, 'packages/llm/src/index.ts'),
      '@jobscope/schemas': path.resolve(root, 'packages/schemas/src/index.ts'),
    },
  },
});
