import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['pipeline/**/__tests__/**/*.{test,spec}.ts', 'shared/**/__tests__/**/*.{test,spec}.ts'],
    // Tests create temp dirs and stub process-wide state
    pool: 'forks',
    testTimeout: 15000
  }
})
