import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['{shared,server,cli}/src/**/__tests__/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
    },
  },
});
