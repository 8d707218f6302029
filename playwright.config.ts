import { defineConfig } from '@playwright/test';

// Browser specs serve the fixture site from memory (tests/support/site.ts); nothing leaves the process.
export default defineConfig({
  testDir: './tests',
  testMatch: '**/*.spec.ts',
  fullyParallel: true,
  timeout: 30000,
  use: {
    headless: process.env.HEADLESS !== 'false',
  },
});
