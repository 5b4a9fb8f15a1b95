import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

export default defineConfig({
    plugins: [react()],
    build: {
        outDir: 'dist/public',
        emptyOutDir: true,
    },
    server: {
        proxy: {
            '/api': 'http://localhost:3001',
            '/plots': 'http://localhost:3001',
        },
    },
});
