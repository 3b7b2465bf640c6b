/// <reference types="vitest" />
import { defineConfig } from 'vite';
import { fileURLToPath } from 'url';

export default defineConfig({
    resolve: {
        alias: {
            '@': fileURLToPath(new URL('./src', import.meta.url)),
        }
    },
    test: {
        environment: 'node',
        include: ['tests/unit/**/*.spec.ts'],
        pool: 'threads',
        poolOptions: {
            threads: {
                minThreads: 1,
                maxThreads: 4,
            }
        },
        testTimeout: 10000,
        hookTimeout: 10000,
        teardownTimeout: 5000,
    }
});
