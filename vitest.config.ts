import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['src/**/__tests__/**/*.test.ts'],
        env: {
            NODE_ENV: 'test',
            STORE_DRIVER: 'memory',
            JWT_SECRET: 'test-secret',
        },
        coverage: {
            reporter: ['text', 'json', 'html'],
            include: ['src/**/*.ts'],
        },
    },
});
