import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/__tests__/**/*.spec.ts'],
        // Read by src/config.ts at import time
        env: {
            DB_ENCRYPTION_KEY: 'test-secret-key',
            DB_PATH: ':memory:',
            LOG_LEVEL: 'silent',
            SWEEP_INTERVAL_MS: '0',
            QUEUE_INLINE_WORKER: 'false',
            QUEUE_POLL_INTERVAL_MS: '50',
        },
    },
});
