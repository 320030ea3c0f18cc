import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  plugins: [react()],
  server: {
    port: 5173,
  },
  resolve: {
    alias: {
      // Resolve the 'shared' workspace package to its TypeScript source
      // so Vite's esbuild pipeline can process it directly
      shared: path.resolve(rootDir, '../../packages/shared/src'),
    },
  },
});
