import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.spec.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    passWithNoTests: false,
    // Use forks pool for native module compatibility (better-sqlite3)
    // Threads pool can crash when workers terminate with open DB connections
    pool: 'forks',
    isolate: true,
    env: {
      LOG_LEVEL: 'error',
      FLEET_FUEL_TIMEZONE: 'America/Sao_Paulo',
    },
  },
});
