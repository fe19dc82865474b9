import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    environment: 'node',
    // Agents apply the resolved log config; keep them quiet
    env: { LOG_LEVEL: 'silent' },
    // TensorFlow.js training runs on the CPU backend
    testTimeout: 30_000,
  },
});
