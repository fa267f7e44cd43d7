import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['world/**/*.test.ts', 'realtime-server/**/*.test.ts'],
    environment: 'node',
  },
});
