import react from '@vitejs/plugin-react'
import { resolve } from 'path'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  plugins: [react()],
  resolve: {
    alias: {
      '@': resolve(__dirname, './src'),
      '@chapter-search/search': resolve(__dirname, '../search/src/index.ts'),
    },
  },
  test: {
    name: 'web',
    globals: false,
    environment: 'jsdom',
    include: ['src/**/*.test.{ts,tsx}'],
  },
})
