import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    // Include test files
    include: ['src/**/*.test.ts'],
  },
  esbuild: {
    target: 'es2022',
  },
});
