/**
 * Vitest Workspace Configuration
 *
 * Stratifies tests into two categories:
 * - unit: Fast, isolated tests of one module (*.unit.test.ts)
 * - integration: Tests that run several packages together (*.integration.test.ts)
 *
 * Usage:
 *   npm run test:unit
 *   npm run test:integration
 */
const packages = ['core', 'config', 'npy', 'sparse'];

export default [
  {
    extends: './vitest.shared.ts',
    test: {
      name: 'unit',
      include: packages.map(pkg => `${pkg}/src/__tests__/**/*.unit.test.ts`),
      exclude: ['**/node_modules/**', '**/dist/**'],
    },
  },
  {
    extends: './vitest.shared.ts',
    test: {
      name: 'integration',
      include: packages.map(pkg => `${pkg}/src/__tests__/**/*.integration.test.ts`),
      exclude: ['**/node_modules/**', '**/dist/**'],
      // Property-based round trips run many cases
      testTimeout: 15000,
    },
  },
];
