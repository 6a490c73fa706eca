import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  resolve: {
    alias: {
      // Workspace package resolves to its TypeScript sources
      '@facility-throughput/domain': fileURLToPath(
        new URL('./packages/domain/src/index.ts', import.meta.url)
      ),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    setupFiles: ['packages/domain/test/setup.ts'],
  },
});
