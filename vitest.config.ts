import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['service-host/src/**/__tests__/**/*.test.ts'],
    setupFiles: ['service-host/src/testing/setup.ts'],
    environment: 'node',
  },
});
