import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['app/src/**/__tests__/**/*.test.ts', 'app/tests/unit/**/*.test.ts'],
    environment: 'node',
    sequence: { concurrent: false },
  },
});
