import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['./src/setupTests.ts'],
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    clearMocks: true,
  },
});
