import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
    test: {
        // Test environment
        environment: 'node',

        // Global setup
        globals: true,

        // Setup files
        setupFiles: ['./src/test/setup.ts'],

        // Include patterns
        include: [
            'src/**/*.{test,spec}.ts',
        ],

        // Exclude patterns
        exclude: [
            'node_modules',
            'dist',
        ],

        // Coverage configuration
        coverage: {
            provider: 'v8',
            reporter: ['text', 'text-summary', 'json', 'html', 'lcov'],
            reportsDirectory: './coverage',

            // Included files for coverage
            include: [
                'src/lib/**/*.ts',
            ],

            // Excluded files from coverage
            exclude: [
                'src/**/*.test.ts',
                'src/test/**/*',
                '**/*.d.ts',
                'node_modules/**',
            ],

            // Coverage thresholds, enforced by `npm run test:coverage`
            thresholds: {
                lines: 80,
                branches: 75,
                functions: 80,
                statements: 80,
            },
        },

        // Timeout settings
        testTimeout: 10000,
        hookTimeout: 10000,

        // Parallel execution - using forks pool which is more compatible
        pool: 'forks',
    },

    // Path aliases matching tsconfig
    resolve: {
        alias: {
            '@': fileURLToPath(new URL('./src', import.meta.url)),
        },
    },
});
