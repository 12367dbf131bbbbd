import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        setupFiles: ['./vitest.setup.ts'],
        include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
        testTimeout: 10000,
    },
});
