import { defineConfig } from 'vitest/config';
import react from '@vitejs/plugin-react';

export default defineConfig({
    plugins: [react()],
    test: {
        environment: 'node',
        include: ['server/src/**/*.test.ts', 'services/**/*.test.ts', 'components/**/*.test.tsx'],
    },
});
