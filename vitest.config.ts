import { defineConfig } from 'vitest/config'
import { fileURLToPath, URL } from 'node:url'

export default defineConfig({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    // worker-thread scans spawn tsx-loaded threads; give them room
    testTimeout: 30000,
    coverage: {
      provider: 'v8',
      reportsDirectory: 'coverage',
      reporter: ['text', 'lcov', 'html'],
      all: true,
      include: ['src/solver/**', 'src/policy/**', 'eval/sim/core.ts'],
      exclude: ['**/__tests__/**', '**/*.test.*', 'src/solver/index.ts'],
      thresholds: {
        statements: 90,
        branches: 75,
        functions: 90,
        lines: 90,
      },
    },
    include: ['src/**/*.test.ts', 'eval/**/*.test.ts'],
    globals: true,
  },
})
