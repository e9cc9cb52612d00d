/**
 * config.ts
 * Config for registration runs: Banner URL, bounded waits, pacing and camp delays.
 * Every setting can be overridden from the environment (or a .env file).
 */

import { z } from 'zod';
import type { RegisterConfig } from './types';

// Banner registration page (user still logs in manually)
export const REGISTER_URL =
  'https://registration.banner.gatech.edu/StudentRegistrationSsb/ssb/classRegistration/classRegistration';

export function getDefaultConfig(): RegisterConfig {
  return {
    registerUrl: REGISTER_URL,
    browserChannel: undefined,
    headless: false,
    readyTimeoutMs: 20_000,
    tabTimeoutMs: 5_000,
    outcomeTimeoutMs: 10_000,
    addDelayMs: 600,
    submitSettleMs: 1_200,
    pollIntervalMs: 250,
    camp: {
      minDelayS: 45,
      maxDelayS: 90,
      maxAttempts: 0,
      reloadSettleMs: 2_000,
    },
  };
}

const ms = z.coerce.number().int().nonnegative();
const flag = z
  .string()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0']))
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  REGISTER_URL: z.string().url().optional(),
  BROWSER_CHANNEL: z.string().optional(),
  HEADLESS: flag.optional(),
  READY_TIMEOUT_MS: ms.optional(),
  TAB_TIMEOUT_MS: ms.optional(),
  OUTCOME_TIMEOUT_MS: ms.optional(),
  ADD_DELAY_MS: ms.optional(),
  SUBMIT_SETTLE_MS: ms.optional(),
  POLL_INTERVAL_MS: z.coerce.number().int().positive().optional(),
  CAMP_MIN_DELAY_S: ms.optional(),
  CAMP_MAX_DELAY_S: ms.optional(),
  CAMP_MAX_ATTEMPTS: ms.optional(),
  RELOAD_SETTLE_MS: ms.optional(),
});

type EnvKey = keyof z.input<typeof envSchema>;

// `KEY=` lines in .env come through as empty strings, treat those as missing
function pickEnv(env: NodeJS.ProcessEnv): Partial<Record<EnvKey, string>> {
  const picked: Partial<Record<EnvKey, string>> = {};
  for (const key of envSchema.keyof().options) {
    const value = env[key]?.trim();
    if (value) picked[key] = value;
  }
  return picked;
}

// Layers environment overrides on top of the defaults. Throws listing every bad value.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RegisterConfig {
  const parsed = envSchema.safeParse(pickEnv(env));
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid configuration:\n  ${problems.join('\n  ')}`);
  }

  const e = parsed.data;
  const d = getDefaultConfig();
  const cfg: RegisterConfig = {
    registerUrl: e.REGISTER_URL ?? d.registerUrl,
    browserChannel: e.BROWSER_CHANNEL ?? d.browserChannel,
    headless: e.HEADLESS ?? d.headless,
    readyTimeoutMs: e.READY_TIMEOUT_MS ?? d.readyTimeoutMs,
    tabTimeoutMs: e.TAB_TIMEOUT_MS ?? d.tabTimeoutMs,
    outcomeTimeoutMs: e.OUTCOME_TIMEOUT_MS ?? d.outcomeTimeoutMs,
    addDelayMs: e.ADD_DELAY_MS ?? d.addDelayMs,
    submitSettleMs: e.SUBMIT_SETTLE_MS ?? d.submitSettleMs,
    pollIntervalMs: e.POLL_INTERVAL_MS ?? d.pollIntervalMs,
    camp: {
      minDelayS: e.CAMP_MIN_DELAY_S ?? d.camp.minDelayS,
      maxDelayS: e.CAMP_MAX_DELAY_S ?? d.camp.maxDelayS,
      maxAttempts: e.CAMP_MAX_ATTEMPTS ?? d.camp.maxAttempts,
      reloadSettleMs: e.RELOAD_SETTLE_MS ?? d.camp.reloadSettleMs,
    },
  };

  if (cfg.camp.minDelayS > cfg.camp.maxDelayS) {
    throw new Error(
      `Invalid configuration:\n  CAMP_MIN_DELAY_S (${cfg.camp.minDelayS}) is greater than CAMP_MAX_DELAY_S (${cfg.camp.maxDelayS})`,
    );
  }
  return cfg;
}
