import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/**/src/**/*.test.ts'],
    reporters: ['default'],
    env: {
      LOG_LEVEL: 'silent'
    }
  }
});
