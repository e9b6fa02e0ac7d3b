import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['tests/unit/**/*.test.ts'],
        testTimeout: 30000,
        // src/core/config.ts validates the environment on import
        env: {
            LIVEKIT_URL: 'http://localhost:7880',
            LIVEKIT_API_KEY: 'test-key',
            LIVEKIT_API_SECRET: 'test-secret',
            LOG_LEVEL: 'ERROR',
        },
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html'],
            include: ['src/**/*.ts'],
        },
    },
});
