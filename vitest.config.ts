import { defineConfig } from 'vitest/config'
import path from 'path'

export default defineConfig({
  resolve: {
    alias: {
      '@': path.resolve(__dirname, './backend/price-service/src'),
    },
  },
  test: {
    environment: 'node',
    include: ['backend/price-service/src/**/*.test.ts'],
    setupFiles: ['./backend/price-service/src/test/setup.ts'],
  },
})
