import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  resolve: {
    alias: {
      '@certmap/logger': fileURLToPath(new URL('../../packages/logger/src/index.ts', import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Keep test output readable; tests that need logs raise the level themselves
    env: {
      LOG_LEVEL: 'error',
    },
  },
})
