import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import * as path from 'node:path';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    include: [
      'packages/*/src/**/__tests__/**/*.test.ts',
      'apps/*/src/**/__tests__/**/*.test.ts',
      'tests/**/*.test.ts',
    ],
    environment: 'node',
    globals: false,
    env: {
      CADENCE_LOG_LEVEL: 'silent',
    },
  },
  resolve: {
    alias: {
      '@cadence/shared': path.resolve(root, 'packages/shared/src/index.ts'),
      '@cadence/scheduler': path.resolve(root, 'packages/scheduler/src/index.ts'),
      '@cadence/executors': path.resolve(root, 'packages/executors/src/index.ts'),
    },
  },
});
