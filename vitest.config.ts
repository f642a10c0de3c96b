import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        // Enable globals (describe, it, expect) without imports
        globals: true,

        // Use Node environment for TypeScript testing
        environment: 'node',

        // Include test files
        include: ['src/**/*.test.ts', 'src/**/*.spec.ts'],

        // Coverage configuration
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html', 'lcov'],
            include: ['src/**/*.ts'],
            exclude: ['src/**/*.test.ts', 'src/**/*.spec.ts', 'src/cli/bin.ts'],
            reportsDirectory: './coverage',
        },

        env: {
            NODE_ENV: 'test',
        },

        // Property tests run many cases
        testTimeout: 10000,
    },
});
