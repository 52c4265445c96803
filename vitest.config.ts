import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'happy-dom',
    globals: true,
    setupFiles: [],
    include: ['web/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['web/src/**/*.ts'],
      exclude: ['web/src/**/*.test.ts', 'web/src/**/*.d.ts'],
    },
  },
});
