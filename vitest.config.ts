import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // Argon2id runs in pure JS; keep room for slower CI machines
    testTimeout: 30000,
  },
});
