/**
 * camp.ts
 *
 * Camps for a seat: repeats the registration pass for CRNs that may still open up,
 * waiting a random delay and reloading Banner between attempts.
 * Stops once every CRN is settled, on a PageStateError, on abort (Ctrl+C),
 * or after camp.maxAttempts (0 = no limit).
 */

import { setTimeout as delay } from 'node:timers/promises';
import { getDefaultConfig } from './config';
import { partitionCrns } from './crns';
import { PageStateError } from './errors';
import { Logger } from './logger';
import { notAttempted } from './outcome';
import type { RegistrationPage } from './page';
import { runRegistration } from './run';
import type { CampResult, CampStop, RegisterConfig, RegistrationRun, SubmissionResult } from './types';

export type CampOptions = {
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  onAttempt?: (attempt: number, run: RegistrationRun) => void;
};

// Retrying won't change these
const FINAL_REASONS: ReadonlySet<string> = new Set([
  'duplicate',
  'crn does not exist',
  'time conflict',
  'prerequisite',
  'maximum hours exceeded',
]);

export function isSettled(result: SubmissionResult): boolean {
  if (result.status === 'accepted') return true;
  return result.status === 'rejected' && FINAL_REASONS.has(result.reason);
}

// whole seconds in [minS, maxS]
export function pickDelayS(minS: number, maxS: number, random: () => number = Math.random): number {
  return minS + Math.floor(random() * (maxS - minS + 1));
}

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal });
}

export async function campForSeat(
  page: RegistrationPage,
  crns: readonly string[],
  cfg: RegisterConfig = getDefaultConfig(),
  options: CampOptions = {},
): Promise<CampResult> {
  const sleep = options.sleep ?? defaultSleep;
  const random = options.random ?? Math.random;

  const { valid, invalid } = partitionCrns(crns);
  for (const err of invalid) Logger.warn(`Skipping ${err.message}`);
  if (valid.length === 0) {
    return { results: [], invalid, fatal: null, attempts: 0, stoppedBy: 'invalid' };
  }

  // keyed by position so duplicate CRNs are tracked separately
  const latest = new Map<number, SubmissionResult>();
  let open = valid.map((crn, index) => ({ crn, index }));
  let attempts = 0;

  const finish = (stoppedBy: CampStop, fatal: PageStateError | null = null): CampResult => ({
    results: valid.map((crn, i) => latest.get(i) ?? notAttempted(crn, 'stopped before this CRN was attempted')),
    invalid,
    fatal,
    attempts,
    stoppedBy,
  });

  while (true) {
    if (options.signal?.aborted) return finish('aborted');

    attempts++;
    const run = await runRegistration(page, open.map((o) => o.crn), cfg);
    open.forEach((o, i) => latest.set(o.index, run.results[i]));
    options.onAttempt?.(attempts, run);

    if (run.fatal) return finish('fatal', run.fatal);

    open = open.filter((_, i) => !isSettled(run.results[i]));
    if (open.length === 0) return finish('settled');
    if (cfg.camp.maxAttempts > 0 && attempts >= cfg.camp.maxAttempts) return finish('exhausted');

    const delayS = pickDelayS(cfg.camp.minDelayS, cfg.camp.maxDelayS, random);
    Logger.info(`Retrying ${open.length} CRN(s) in ${delayS}s...`);
    try {
      await sleep(delayS * 1000, options.signal);
    } catch (err) {
      if (options.signal?.aborted) return finish('aborted');
      throw err;
    }

    // refresh to keep Banner state sane
    try {
      await page.reload();
      await page.pause(cfg.camp.reloadSettleMs);
    } catch (err) {
      if (!(err instanceof PageStateError)) throw err;
      Logger.error(`Reload failed: ${err.message}`);
      return finish('fatal', err);
    }
  }
}
