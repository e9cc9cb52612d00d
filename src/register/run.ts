/**
 * run.ts
 *
 * Runs one registration pass over a CRN list:
 * - validates every CRN up front (malformed ones never reach the page)
 * - checks the page is on the Enter CRNs screen
 * - for each CRN in order: add it to the summary, submit, wait for the page to settle
 * - records accepted / rejected per CRN; after a PageStateError the rest are not-attempted
 */

import { getDefaultConfig } from './config';
import { partitionCrns } from './crns';
import { PageStateError } from './errors';
import { Logger } from './logger';
import { classifyOutcome, notAttempted, waitForOutcome } from './outcome';
import type { RegistrationPage } from './page';
import type { RegisterConfig, RegistrationRun, SubmissionResult } from './types';

async function submitCrn(page: RegistrationPage, crn: string, cfg: RegisterConfig): Promise<SubmissionResult> {
  await page.dismissMessages();
  // whatever survived the dismiss belongs to an earlier CRN
  const before = await page.readSnapshot(crn);
  await page.addCrn(crn);
  await page.pause(cfg.addDelayMs);
  await page.submit();

  const snapshot = await waitForOutcome(page, crn, cfg, before.messages);
  return classifyOutcome(crn, snapshot);
}

export async function runRegistration(
  page: RegistrationPage,
  crns: readonly string[],
  cfg: RegisterConfig = getDefaultConfig(),
): Promise<RegistrationRun> {
  const { valid, invalid } = partitionCrns(crns);
  for (const err of invalid) Logger.warn(`Skipping ${err.message}`);

  if (valid.length === 0) {
    return { results: [], invalid, fatal: null };
  }

  try {
    await page.ensureReady();
  } catch (err) {
    if (!(err instanceof PageStateError)) throw err;
    const reason = err.message;
    Logger.error(`Registration page not ready: ${reason}`);
    return { results: valid.map((crn) => notAttempted(crn, reason)), invalid, fatal: err };
  }

  const results: SubmissionResult[] = [];
  let fatal: PageStateError | null = null;

  for (const crn of valid) {
    if (fatal) {
      results.push(notAttempted(crn, fatal.message));
      continue;
    }

    Logger.debug(`Submitting CRN ${crn}`);
    try {
      const result = await submitCrn(page, crn, cfg);
      Logger.info(`CRN ${crn}: ${result.status}${result.status === 'rejected' ? ` (${result.reason})` : ''}`);
      results.push(result);
    } catch (err) {
      if (!(err instanceof PageStateError)) throw err;
      Logger.error(`Stopping run at CRN ${crn}: ${err.message}`);
      fatal = err;
      results.push(notAttempted(crn, err.message));
    }
  }

  return { results, invalid, fatal };
}
