/**
 * Vitest Configuration for Server Package
 *
 * - Node.js test environment
 * - Unit and route tests next to the code under __tests__/
 * - Logs suppressed below error level
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Test environment - Node.js for server-side testing
    environment: 'node',

    // Test file patterns
    include: [
      '__tests__/**/*.test.ts',
      'config/**/*.test.ts',
      'lib/**/*.test.ts',
      'middleware/**/*.test.ts',
      'routes/**/*.test.ts',
      'services/**/*.test.ts'
    ],

    exclude: [
      '**/node_modules/**',
      '**/dist/**'
    ],

    setupFiles: ['./tests/setupTests.ts'],

    testTimeout: 10000,

    // Environment variables for testing
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'error' // Suppress logs during testing
    },

    watch: false,
    isolate: true
  }
})
