import { config as loadEnv } from 'dotenv'
import { defineConfig } from 'vitest/config'

// Load test environment variables
loadEnv({ path: '.env.test' })

export default defineConfig({
  test: {
    globals: false,
    isolate: true,
    include: ['tests/**/*.{test,spec}.ts'],
    testTimeout: 10000,
  },
})
