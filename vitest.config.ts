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
    coverage: {
      provider: 'v8',
      reportsDirectory: 'coverage',
      reporter: ['text', 'lcov', 'html'],
      all: true,
      // Core coverage scope: solver + pool protocol (worker-thread plumbing excluded)
      include: ['src/**'],
      exclude: ['**/__tests__/**', '**/*.test.*', 'src/worker/entropy.worker.ts'],
      thresholds: {
        statements: 85,
        branches: 75,
        functions: 85,
        lines: 85,
      },
    },
    include: ['src/**/*.test.ts', 'eval/**/*.test.ts'],
    globals: true,
  },
})
