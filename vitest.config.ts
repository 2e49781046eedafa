import { defineConfig } from 'vitest/config'
import react from '@vitejs/plugin-react'

export default defineConfig({
  plugins: [react()],
  test: {
    globals: true,
    environment: 'jsdom',
    setupFiles: ['./frontend/src/setupTests.ts'],
    include: ['{frontend,cli,shared}/**/__tests__/**/*.test.{ts,tsx}'],
  },
})
