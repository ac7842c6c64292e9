import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import { resolve } from 'node:path';

const root = fileURLToPath(new URL('../..', import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@bulletin/shared/schemas': resolve(root, 'packages/shared/src/schemas/index.ts'),
      '@bulletin/shared/dates': resolve(root, 'packages/shared/src/dates.ts'),
      '@bulletin/shared': resolve(root, 'packages/shared/src/index.ts'),
      '@bulletin/db/schema': resolve(root, 'packages/db/src/schema/index.ts'),
      '@bulletin/db': resolve(root, 'packages/db/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    testTimeout: 10_000,
  },
});
