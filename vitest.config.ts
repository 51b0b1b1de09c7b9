import path from 'node:path';
import { defineConfig } from 'vitest/config';

const repoRoot = __dirname;
const alias = {
  '@libs/dokan-http-core': path.resolve(repoRoot, 'libs/dokan-http-core/src/index.ts'),
  '@libs/dokan-client': path.resolve(repoRoot, 'libs/dokan-client/src/index.ts'),
};

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['libs/*/src/**/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
