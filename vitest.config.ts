import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
    reporters: 'default',
    // Trace output is opt-in per test
    env: { MIPSI_TRACE: '' },
  },
});
