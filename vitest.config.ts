import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['cdk/**/*.test.ts'],
    environment: 'node',
    // Synthesizing stacks takes a few seconds per template
    testTimeout: 30000,
  },
});
