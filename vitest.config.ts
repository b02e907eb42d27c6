import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        mockReset: true,
        clearMocks: true,
        restoreMocks: true,
        include: ['src/**/*.test.ts'],
    },
});
