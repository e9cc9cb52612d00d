/**
 * outcome.ts
 *
 * Turns what the page shows after a submit into a per-CRN result.
 * - waits (bounded) for either a summary row status or a message to appear
 * - known rejection text wins over a "Registered" row
 */

import { classifyMessage, isRegisteredStatus } from './errors';
import type { RegistrationPage } from './page';
import type { PageSnapshot, RegisterConfig, SubmissionResult } from './types';

const MAX_REASON_LENGTH = 200;

export function notAttempted(crn: string, reason: string): SubmissionResult {
  return { crn, status: 'not-attempted', reason };
}

// A row still saying "Pending" hasn't been processed yet.
export function hasOutcome(snapshot: PageSnapshot): boolean {
  if (snapshot.messages.length > 0) return true;
  return snapshot.rowStatus !== null && !/pending/i.test(snapshot.rowStatus);
}

function firstLine(text: string): string {
  return text.split('\n')[0].trim().slice(0, MAX_REASON_LENGTH);
}

export function classifyOutcome(crn: string, snapshot: PageSnapshot): SubmissionResult {
  const { rowStatus, messages } = snapshot;

  for (const text of rowStatus === null ? messages : [...messages, rowStatus]) {
    const reason = classifyMessage(text);
    if (reason) return { crn, status: 'rejected', reason, messages };
  }

  if (rowStatus !== null && isRegisteredStatus(rowStatus)) {
    return { crn, status: 'accepted', messages };
  }

  const observed = messages[0] ?? rowStatus;
  if (observed) return { crn, status: 'rejected', reason: firstLine(observed), messages };

  return { crn, status: 'rejected', reason: 'no confirmation shown', messages };
}

// Drops messages that were already on screen before this CRN was submitted,
// unless they name this CRN.
export function freshMessages(snapshot: PageSnapshot, before: readonly string[], crn: string): PageSnapshot {
  return {
    rowStatus: snapshot.rowStatus,
    messages: snapshot.messages.filter((m) => !before.includes(m) || m.includes(crn)),
  };
}

// Polls the page until something shows up for this CRN or outcomeTimeoutMs runs out.
// Time is counted in pauses so the page decides how long a pause really takes.
export async function waitForOutcome(
  page: RegistrationPage,
  crn: string,
  cfg: RegisterConfig,
  before: readonly string[] = [],
): Promise<PageSnapshot> {
  await page.pause(cfg.submitSettleMs);

  let snapshot = freshMessages(await page.readSnapshot(crn), before, crn);
  let waited = 0;
  while (!hasOutcome(snapshot) && waited < cfg.outcomeTimeoutMs) {
    await page.pause(cfg.pollIntervalMs);
    waited += cfg.pollIntervalMs;
    snapshot = freshMessages(await page.readSnapshot(crn), before, crn);
  }
  return snapshot;
}
