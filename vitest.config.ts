import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/server/**/*.test.ts'],
    environment: 'node',
  },
});
