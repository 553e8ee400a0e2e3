import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    globals: true,
    testTimeout: 30000,
    server: {
      deps: {
        external: [/better-sqlite3/]
      }
    }
  }
});
