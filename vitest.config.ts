import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
    resolve: {
        // Workspace aliases so tests run against sources without a build
        alias: [
            {
                find: /^@quay\/core\/test-utils$/,
                replacement: path.resolve(rootDir, 'packages/core/src/test-utils.ts'),
            },
            { find: /^@quay\/core$/, replacement: path.resolve(rootDir, 'packages/core/src/index.ts') },
            {
                find: /^@quay\/resources$/,
                replacement: path.resolve(rootDir, 'packages/resources/src/index.ts'),
            },
        ],
    },
    test: {
        globals: true,
        environment: 'node',
        include: ['packages/*/src/**/*.test.ts'],
    },
});
