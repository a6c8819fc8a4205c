import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/cli/**', 'src/mcp/transports/**'],
      thresholds: {
        lines: 80,
        branches: 75,
      },
    },
    testTimeout: 15000,
  },
});
