import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['src/**/*.test.ts'],
        exclude: ['**/node_modules/**', '**/dist/**'],
        env: {
            NODE_ENV: 'test',
            DATABASE_URL: 'postgres://localhost:5432/pharmacy_test',
            JWT_SECRET: 'test-secret',
        },
        testTimeout: 30000,
        hookTimeout: 60000,
    },
});
