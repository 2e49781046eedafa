import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

const hmrProtocol = process.env.VITE_HMR_PROTOCOL

export default defineConfig({
  root: fileURLToPath(new URL('.', import.meta.url)),
  plugins: [react()],
  build: {
    outDir: fileURLToPath(new URL('../dist', import.meta.url)),
    emptyOutDir: true,
  },
  server: {
    host: true,
    port: 5173,
    strictPort: true,
    hmr: {
      // Set these when serving behind a reverse proxy / TLS terminator
      // e.g. VITE_HMR_HOST=console.example.com VITE_HMR_PORT=443 VITE_HMR_PROTOCOL=wss
      host: process.env.VITE_HMR_HOST || undefined,
      clientPort: process.env.VITE_HMR_PORT ? Number(process.env.VITE_HMR_PORT) : undefined,
      protocol: hmrProtocol === 'ws' || hmrProtocol === 'wss' ? hmrProtocol : undefined,
    },
  },
})
