import path from 'node:path';
import {fileURLToPath} from 'node:url';
import {defineConfig} from 'vitest/config';

const dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@theater/database/schema': path.resolve(
        dirname,
        './packages/database/src/schema/index.ts',
      ),
      '@theater/database': path.resolve(
        dirname,
        './packages/database/src/index.ts',
      ),
    },
  },
  test: {
    include: [
      'apps/api/src/**/*.test.ts',
      'packages/database/src/**/*.test.ts',
    ],
    exclude: ['node_modules/**'],
    environment: 'node',
    globals: true,
    setupFiles: ['./vitest.setup.node.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'html'],
      exclude: ['node_modules/**', 'dist/**'],
    },
    pool: 'threads',
    poolOptions: {
      threads: {
        singleThread: true,
      },
    },
  },
});
