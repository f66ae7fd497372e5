import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    jsx: 'automatic',
  },
  test: {
    include: ['backend/src/**/*.test.ts', 'frontend/src/**/*.test.{ts,tsx}'],
    // Component tests opt into jsdom with a @vitest-environment comment
    environment: 'node',
    setupFiles: ['./vitest.setup.ts'],
    restoreMocks: true,
  },
});
