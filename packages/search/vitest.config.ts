import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'search',
    globals: false,
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
})
