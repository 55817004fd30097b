import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const root = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Subpath exports (must come before main package aliases)
      '@coinlab/core/utils': root('./packages/core/src/utils/index.ts'),
      '@coinlab/core/types': root('./packages/core/src/types/index.ts'),
      // Main package aliases
      '@coinlab/core': root('./packages/core/src/index.ts'),
      '@coinlab/simulator': root('./packages/simulator/src/index.ts'),
      '@coinlab/wallet': root('./packages/wallet/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/src/**/*.test.ts'],
    // Signing and verification dominate the wallet tests
    testTimeout: 30_000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['**/*.test.ts', '**/index.ts'],
    },
  },
});
