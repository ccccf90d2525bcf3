import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const pkg = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
  resolve: {
    alias: {
      '@aequi/types': pkg('./packages/types/src/index.ts'),
      '@aequi/ledger': pkg('./packages/ledger/src/index.ts'),
      '@aequi/registry': pkg('./packages/registry/src/index.ts'),
      '@aequi/executor': pkg('./packages/executor/src/index.ts'),
      '@aequi/audit': pkg('./packages/audit/src/index.ts'),
    },
  },
});
