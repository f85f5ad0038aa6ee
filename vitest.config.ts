import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Only include test files in tests/ directory
    include: ['tests/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/.git/**', '**/models/**'],
    // Pipeline tests share the process cwd and temp directories
    fileParallelism: false,
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
