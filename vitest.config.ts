import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['regions/system/library/typescript/*/__tests__/**/*.test.ts'],
  },
});
