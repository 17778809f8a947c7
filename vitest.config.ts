import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist', 'generated_files'],
    env: {
      LOG_LEVEL: 'silent'
    },
    testTimeout: 10000,
    clearMocks: true,
    watch: false
  }
});
