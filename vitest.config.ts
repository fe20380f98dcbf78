import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['tests/**/*.test.ts'],
        environment: 'node',
        // Test files share tests/tmp; run them one at a time
        fileParallelism: false,
    },
});
