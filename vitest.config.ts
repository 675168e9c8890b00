import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/*.test.ts'],
        environment: 'node',
        env: {
            NODE_ENV: 'test',
            LOG_TO_FILE: 'false',
            LOG_LEVEL: 'error',
            DRY_RUN: 'true',
        },
        testTimeout: 10000,
    },
});
