import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['mcp-server/src/**/*.test.ts'],
    setupFiles: ['mcp-server/src/vitest.setup.ts'],
    environment: 'node',
    testTimeout: 20000,
  },
});
