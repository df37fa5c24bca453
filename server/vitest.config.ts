import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/__tests__/**/*.test.ts'],
    // No log file during tests
    env: {
      LOG_DIR: '',
      DEBUG: 'false',
    },
    server: {
      deps: {
        inline: ['meyda'],
      },
    },
  },
});
