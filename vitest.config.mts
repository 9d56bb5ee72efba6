import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        include: ['apps/engine/tests/**/*.test.ts'],
        environment: 'node',
        env: {
            NODE_ENV: 'test',
        },
    },
});
