import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['libs/**/src/**/*.spec.ts', 'apps/**/src/**/*.spec.ts'],
  },
});
