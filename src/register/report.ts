/**
 * report.ts
 *
 * Console lines for a run: skipped input, one line per CRN, a summary and the exit code.
 */

import type { RegistrationRun, SubmissionResult } from './types';

const MAX_MESSAGES = 4;

export function formatResult(result: SubmissionResult): string {
  switch (result.status) {
    case 'accepted':
      return `${result.crn}  accepted`;
    case 'rejected':
      return `${result.crn}  rejected (${result.reason})`;
    case 'not-attempted':
      return `${result.crn}  not attempted (${result.reason})`;
  }
}

export function countResults(results: readonly SubmissionResult[]): Record<SubmissionResult['status'], number> {
  const counts = { accepted: 0, rejected: 0, 'not-attempted': 0 };
  for (const r of results) counts[r.status]++;
  return counts;
}

function summaryLine(results: readonly SubmissionResult[]): string {
  const c = countResults(results);
  return `accepted=${c.accepted} rejected=${c.rejected} not-attempted=${c['not-attempted']}`;
}

export function formatRun(run: RegistrationRun): string[] {
  const lines = run.invalid.map((err) => `Skipped: ${err.message}`);
  lines.push(...run.results.map(formatResult));
  lines.push(summaryLine(run.results));
  if (run.fatal) lines.push(`Aborted: ${run.fatal.message}`);
  return lines;
}

// Progress for one camping attempt, with the first line of the first few page messages
export function formatAttempt(attempt: number, run: RegistrationRun): string[] {
  const lines = [`[Attempt ${attempt}] ${summaryLine(run.results)}`];
  const messages: string[] = [];
  for (const r of run.results) {
    if (r.status === 'not-attempted') continue;
    for (const m of r.messages) if (!messages.includes(m)) messages.push(m);
  }
  if (messages.length > 0) {
    lines.push('Messages:');
    for (const m of messages.slice(0, MAX_MESSAGES)) lines.push(` - ${m.split('\n')[0].slice(0, 200)}`);
  }
  return lines;
}

// 1: page not in the expected state or a CRN left unattempted, 2: nothing valid to submit
export function exitCodeFor(run: RegistrationRun): number {
  if (run.fatal) return 1;
  if (run.results.length === 0) return 2;
  if (run.results.some((r) => r.status === 'not-attempted')) return 1;
  return 0;
}
