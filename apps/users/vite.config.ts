import { defineConfig } from 'vite'

export default defineConfig({
  // Workspace packages are TypeScript sources, not prebuilt deps
  optimizeDeps: {
    exclude: ['@users-screen/dom', '@users-screen/errors', '@users-screen/http', '@users-screen/store'],
  },
})
