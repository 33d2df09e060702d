import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    watch: false,

    testTimeout: 30000,
    hookTimeout: 10000,

    // Run tests in sequence to avoid resource conflicts
    pool: 'threads',
    poolOptions: {
      threads: {
        singleThread: true
      }
    },

    clearMocks: true,
    restoreMocks: true,

    include: ['tests/**/*.{test,spec}.ts'],
    exclude: ['node_modules', 'dist', '.git'],

    environment: 'node',
    globals: true,
  }
})
