import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['{packages,services,agents}/*/src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20_000
  }
});
