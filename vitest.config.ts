import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', '*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    restoreMocks: true
  }
});
