import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@tabletalk/agent-contracts': fileURLToPath(
        new URL('./packages/agent-contracts/src/index.ts', import.meta.url),
      ),
    },
  },
});
