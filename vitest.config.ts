import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const packages = ['core', 'transform', 'config', 'executor', 'cli', 'test-utils'];

/**
 * Vitest Configuration
 *
 * One run covers every workspace package:
 * - unit: fast, isolated tests (*.unit.test.ts)
 * - integration: tests over real temporary folders (*.integration.test.ts)
 *
 * Usage:
 *   npm test                     # everything
 *   npm run test:unit            # only unit tests
 *   npm run test:integration     # only integration tests
 */
export default defineConfig({
  // Tests run against sources; package exports point Node at dist/
  resolve: {
    alias: packages.map(name => ({
      find: `@kqlrun/${name}`,
      replacement: fileURLToPath(new URL(`./${name}/src/index.ts`, import.meta.url)),
    })),
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['*/src/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Integration tests touch the filesystem
    testTimeout: 15000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['*/src/**/*.ts'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        '**/__tests__/**',
        'test-utils/**',
      ],
      thresholds: {
        statements: 70,
        branches: 65,
        functions: 70,
        lines: 70,
      },
    },
  },
});
