import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import path from 'path';

const projectRoot = path.dirname(fileURLToPath(new URL(import.meta.url)));
const resolveFromRoot = (p: string) => path.join(projectRoot, p);

export default defineConfig({
  test: {
    include: [
      'packages/**/tests/unit/**/*.test.ts',
      'packages/**/tests/integration/**/*.test.ts',
      'packages/**/tests/properties/**/*.test.ts',
    ],
    exclude: ['node_modules', 'dist', '**/node_modules/**', '**/dist/**'],
    environment: 'node',
    globals: true,
    clearMocks: true,
    restoreMocks: true,
    setupFiles: ['tests/setup.ts'],
    // Integration tests spawn a stand-in simulation binary
    testTimeout: 15000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'html'],
      reportsDirectory: 'coverage',
      include: ['packages/**/src/**/*.ts'],
      exclude: ['packages/**/src/**/index.ts', 'packages/**/src/bin/**'],
    },
  },
  resolve: {
    alias: {
      '@cloverrun/utils': resolveFromRoot('packages/utils/src/index.ts'),
      '@cloverrun/core': resolveFromRoot('packages/core/src/index.ts'),
      '@cloverrun/simulation': resolveFromRoot('packages/simulation/src/index.ts'),
      '@cloverrun/storage': resolveFromRoot('packages/storage/src/index.ts'),
      '@cloverrun/workflows': resolveFromRoot('packages/workflows/src/index.ts'),
      '@cloverrun/cli': resolveFromRoot('packages/cli/src/index.ts'),
    },
  },
});
