import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Project mode for the monorepo: one config per workspace package
    projects: ['packages/@numvec/*/vitest.config.ts'],

    // Global test settings
    globals: true,
    environment: 'node',

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      thresholds: {
        lines: 80,
        functions: 80,
        statements: 80,
        branches: 70,
      },
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/*.config.{ts,js}',
        '**/*.d.ts',
        '**/test/**',
        '**/__tests__/**',
        'benchmark/**',
      ],
    },
  },
})
