import { defineConfig } from '@playwright/test';

export default defineConfig({
  testDir: './tests',
  testMatch: '**/*.test.ts',
  timeout: 30000,
  fullyParallel: true,
  retries: 0,
});
