import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    restoreMocks: true,
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        '**/*.d.ts',
        // Entry points (re-exports only)
        'src/index.ts',
        'src/core/index.ts',
        'src/storage/index.ts',
        'src/config/index.ts',
        'src/config/schemas/index.ts',
        // Type-only files
        'src/core/types.ts',
        'src/storage/types.ts',
        // Test helpers
        'src/testing/**',
      ],
      thresholds: {
        statements: 80,
        branches: 75,
        functions: 80,
        lines: 80,
      },
    },
  },
});
