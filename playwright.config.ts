import { defineConfig } from '@playwright/test';

/**
 * Unit and integration specs run on the Playwright runner without a browser:
 * none of them request the `page` fixture.
 */
export default defineConfig({
  testDir: './tests',
  testMatch: '**/*.spec.ts',
  fullyParallel: false,
  timeout: 30_000,
});
