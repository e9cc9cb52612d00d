/**
 * errors.ts
 *
 * Centralizes error kinds and page-message detection
 * - ValidationError for malformed CRNs (never reaches the browser)
 * - PageStateError when the registration page is not where we expect it
 * - mapping Banner's message text onto a short rejection reason
 */

import type { RejectionReason } from './types';

export class ValidationError extends Error {
  readonly input: string;

  constructor(input: string, message = `Invalid CRN: ${JSON.stringify(input)} (expected 5 digits)`) {
    super(message);
    this.name = 'ValidationError';
    this.input = input;
  }
}

// Raised when an expected element can't be located within the bounded wait.
// Usually means the manual login/navigation wasn't finished, or the layout changed.
export class PageStateError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PageStateError';
  }
}

// Order matters: the first pattern that matches wins.
const REJECTION_PATTERNS: ReadonlyArray<[RegExp, RejectionReason]> = [
  // a bare "closed" false-positives on unrelated notices, so only match the full phrases
  [/closed section|section is closed/i, 'closed section'],
  [/duplicate|already registered/i, 'duplicate'],
  [/time conflict/i, 'time conflict'],
  [/crn does not exist|invalid crn|crn not found/i, 'crn does not exist'],
  [/prerequisite/i, 'prerequisite'],
  [/maximum hours/i, 'maximum hours exceeded'],
];

// returns the canonical reason for a Banner message, or null when it isn't a known rejection
export function classifyMessage(text: string): RejectionReason | null {
  for (const [pattern, reason] of REJECTION_PATTERNS) {
    if (pattern.test(text)) return reason;
  }
  return null;
}

// Summary rows read "Registered" / "**Web Registered**" on success
// and "Errors Preventing Registration" on failure. Pending rows already carry
// "**Web Registered**" as their action, so they don't count.
export function isRegisteredStatus(text: string): boolean {
  return /registered/i.test(text) && !/errors preventing|pending/i.test(text);
}
