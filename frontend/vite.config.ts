import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

const backend = process.env.GEOLOG_BACKEND_URL || 'http://localhost:2025';

export default defineConfig({
  plugins: [react()],
  server: {
    port: 3000,
    proxy: {
      '/log': backend,
      '/api': backend,
      '/socket.io': { target: backend, ws: true },
    },
  },
  build: {
    outDir: 'dist',
  },
});
