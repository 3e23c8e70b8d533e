import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// Resolve workspace packages to their TypeScript sources
const packagesDir = fileURLToPath(new URL('./packages', import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      {
        find: '@subnet-bridge/core/ports',
        replacement: `${packagesDir}/core/ports/index.ts`,
      },
    ],
  },
  test: {
    environment: 'node',
    include: ['packages/**/__tests__/**/*.test.ts'],
    testTimeout: 10000,
  },
});
