import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    reporters: ['default'],
    include: ['services/*/test/**/*.spec.ts'],
  },
});
