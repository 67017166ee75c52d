import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment - jsdom for the DOM adapters
    environment: 'jsdom',

    // Include patterns
    include: ['src/test/**/*.test.ts'],

    // Exclude patterns
    exclude: ['node_modules', 'dist'],

    // Setup files
    setupFiles: ['./src/test/setup.ts'],

    // Environment variables for testing
    env: {
      NODE_ENV: 'test',
    },
  },
});
