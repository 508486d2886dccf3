import { defineConfig } from 'vite';

const backend = process.env.BACKEND_URL || 'http://localhost:3000';

export default defineConfig({
  server: {
    port: 5173,
    proxy: {
      '/api': backend,
      '/health': backend,
    },
  },
});
