import { defineConfig } from '@playwright/test';

// Specs drive the scraper through an in-process fake driver, so no browser project is needed
export default defineConfig({
  testDir: './tests',
  fullyParallel: true,
  forbidOnly: !!process.env.CI,
});
