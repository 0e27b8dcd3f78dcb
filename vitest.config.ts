// vitest.config.ts
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
    resolve: {
        // mirrors the "@/*" path in tsconfig.json
        alias: { '@': rootDir },
    },
    test: {
        environment: 'node',
        include: ['__tests__/**/*.test.ts'],
        reporters: 'default',
    },
});
