import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: [
      './packages/api-contracts/vitest.config.ts',
      './apps/backend/vitest.config.ts',
      './apps/frontend/vitest.config.ts',
    ],
  },
});
