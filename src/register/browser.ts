/**
 * browser.ts
 *
 * Launch options for the headed Chromium window the operator logs into.
 */

import type { LaunchOptions } from '@playwright/test';
import type { RegisterConfig } from './types';

export function browserLaunchOptions(cfg: RegisterConfig): LaunchOptions {
  return {
    headless: cfg.headless,
    channel: cfg.browserChannel,
    args: ['--start-maximized'],
    // Ctrl+C stops camping and still prints the report; main closes the browser itself
    handleSIGINT: false,
  };
}
