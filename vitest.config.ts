import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['field-model/tests/**/*.test.ts'],
    environment: 'node',
  },
});
