import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // keep runs quiet; tests that care about output spy on console directly
    env: {
      LOG_LEVEL: 'error',
    },
  },
})
