import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'hono',
    environment: 'node',
    include: ['test/**/*.test.ts'],
    testTimeout: 15000,
    env: {
      NODE_ENV: 'test',
    },
    coverage: {
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.config.*',
        '**/test/**',
      ],
    },
  },
});
