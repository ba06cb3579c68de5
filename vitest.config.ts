import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

/**
 * Vitest Configuration
 *
 * Unit tests live beside the sources in each workspace package under
 * src/__tests__ and are named *.unit.test.ts.
 */
export default defineConfig({
  resolve: {
    alias: [
      // Workspace package resolves to its TypeScript sources
      {
        find: /^@valtype\/core$/,
        replacement: fileURLToPath(new URL('./core/src/index.ts', import.meta.url)),
      },
    ],
  },
  test: {
    globals: true,
    environment: 'node',
    include: [
      'core/src/__tests__/**/*.unit.test.ts',
      'config/src/__tests__/**/*.unit.test.ts',
    ],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
