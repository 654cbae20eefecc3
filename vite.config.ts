import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

export default defineConfig({
  plugins: [react()],
  build: {
    outDir: 'dist/web',
  },
  server: {
    port: 3000,
    host: '0.0.0.0',
  },
});
