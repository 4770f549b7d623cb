import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';
import { chunkSplit } from './pages/wave-logo-src/services/chunking';

export default defineConfig({
  root: 'pages/wave-logo-src',
  base: './',
  plugins: [react()],
  build: {
    outDir: '../../dist',
    emptyOutDir: true,
    rollupOptions: {
      output: {
        manualChunks: chunkSplit
      }
    }
  }
});
