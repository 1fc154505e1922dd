import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

function source(path: string): string {
  return fileURLToPath(new URL(path, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      // Workspace package aliases; sub-path entries must precede their package
      '@didtoken/crypto/testkit': source('./packages/crypto/src/testkit.ts'),
      '@didtoken/crypto': source('./packages/crypto/src/index.ts'),
      '@didtoken/jwks-cache': source('./packages/jwks-cache/src/index.ts'),
      '@didtoken/verifier': source('./packages/verifier/src/index.ts'),
    },
  },
  test: {
    root: '.',
    exclude: ['**/node_modules/**', '**/dist/**'],
    include: ['packages/*/tests/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
    // Timeout for tests
    testTimeout: 10000,
    // Fail fast on first error in CI
    bail: process.env.CI ? 1 : 0,
  },
});
