import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // better-sqlite3 is a native addon; keep each file in its own process
    pool: 'forks',
  },
});
