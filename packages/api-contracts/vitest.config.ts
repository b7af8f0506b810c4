import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'api-contracts',
    environment: 'node',
    globals: true,
    include: ['src/**/*.test.ts'],
  },
});
