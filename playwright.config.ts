import { defineConfig } from '@playwright/test';

// Only banner.spec.ts requests the `page` fixture; it skips itself when Chromium isn't installed.
export default defineConfig({
  testDir: './tests',
  fullyParallel: true,
});
