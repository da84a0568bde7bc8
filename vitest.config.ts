import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // SLH-DSA keygen and signing in pure JS are slow
    testTimeout: 60_000,
  },
})
