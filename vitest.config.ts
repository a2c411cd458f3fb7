import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const packageSource = (file: string) => fileURLToPath(new URL(`./packages/${file}`, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/tests/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        '**/*.d.ts',
        '**/index.ts',
      ],
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
  resolve: {
    alias: {
      '@replica-drill/shared': packageSource('shared/src/index.ts'),
      '@replica-drill/core': packageSource('core/src/index.ts'),
      '@replica-drill/cli': packageSource('cli/src/program.ts'),
    },
  },
});
