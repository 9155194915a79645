import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: true,
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@jobfill/agents': fromRoot('./agents/src/index.ts'),
      '@jobfill/llm': fromRoot('./packages/llm/src/index.ts'),
    },
  },
});
