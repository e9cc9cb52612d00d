import { test, expect } from '@playwright/test';
import { getDefaultConfig, loadConfig, REGISTER_URL } from '../src/register/config';

test('loadConfig without overrides is the default config', () => {
  const cfg = loadConfig({});
  expect(cfg).toEqual(getDefaultConfig());
  expect(cfg.registerUrl).toBe(REGISTER_URL);
  expect(cfg.headless).toBe(false);
  expect(cfg.camp).toEqual({ minDelayS: 45, maxDelayS: 90, maxAttempts: 0, reloadSettleMs: 2000 });
});

test('loadConfig applies environment overrides and ignores empty values', () => {
  const cfg = loadConfig({
    HEADLESS: '1',
    BROWSER_CHANNEL: 'chrome',
    READY_TIMEOUT_MS: '',
    OUTCOME_TIMEOUT_MS: '3000',
    CAMP_MIN_DELAY_S: '5',
    CAMP_MAX_DELAY_S: '10',
    CAMP_MAX_ATTEMPTS: '3',
  });

  expect(cfg.headless).toBe(true);
  expect(cfg.browserChannel).toBe('chrome');
  expect(cfg.readyTimeoutMs).toBe(20_000);
  expect(cfg.outcomeTimeoutMs).toBe(3_000);
  expect(cfg.camp).toEqual({ minDelayS: 5, maxDelayS: 10, maxAttempts: 3, reloadSettleMs: 2000 });
});

test('loadConfig rejects bad values', () => {
  expect(() => loadConfig({ READY_TIMEOUT_MS: 'soon' })).toThrow(/READY_TIMEOUT_MS/);
  expect(() => loadConfig({ HEADLESS: 'maybe' })).toThrow(/HEADLESS/);
  expect(() => loadConfig({ REGISTER_URL: 'not a url' })).toThrow(/REGISTER_URL/);
  expect(() => loadConfig({ POLL_INTERVAL_MS: '0' })).toThrow(/POLL_INTERVAL_MS/);
  expect(() => loadConfig({ CAMP_MIN_DELAY_S: '100' })).toThrow(
    'CAMP_MIN_DELAY_S (100) is greater than CAMP_MAX_DELAY_S (90)',
  );
});

test('loadConfig reads HEADLESS regardless of case', () => {
  expect(loadConfig({ HEADLESS: 'TRUE' }).headless).toBe(true);
  expect(loadConfig({ HEADLESS: 'False' }).headless).toBe(false);
});
