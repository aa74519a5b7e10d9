import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['core/src/**/*.test.ts', 'providers/src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
  },
  resolve: {
    alias: [
      {
        find: '@vidbridge/core',
        replacement: new URL('./core/src/index.ts', import.meta.url).pathname,
      },
    ],
  },
});
