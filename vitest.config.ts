import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  resolve: {
    alias: {
      '@deckline/logging': fileURLToPath(new URL('./packages/logging/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'services/*/src/**/*.test.ts'],
    environment: 'node',
    env: {
      PRETTY_LOGS: 'false',
      LOG_LEVEL: 'silent',
    },
    testTimeout: 10000,
  },
})
