import { defineConfig } from '@playwright/test';

// Engine and API tests only; nothing here opens a browser.
export default defineConfig({
  testDir: './tests',
  timeout: 30_000,
  forbidOnly: !!process.env.CI,
  retries: 0,
});
