import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.{test,spec}.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
    },
    restoreMocks: true,
  },
});
