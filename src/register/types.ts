/**
 * types.ts
 *
 * Shared TypeScript types used across the registration modules.
 *
 */

import type { PageStateError, ValidationError } from './errors';

export type CampConfig = {
  minDelayS: number;
  maxDelayS: number;
  maxAttempts: number;
  reloadSettleMs: number;
};

export type RegisterConfig = {
  registerUrl: string;
  browserChannel: string | undefined;
  headless: boolean;
  readyTimeoutMs: number;
  tabTimeoutMs: number;
  outcomeTimeoutMs: number;
  addDelayMs: number;
  submitSettleMs: number;
  pollIntervalMs: number;
  camp: CampConfig;
};

export type RegisterMode = 'once' | 'camp';

export type RejectionReason =
  | 'closed section'
  | 'duplicate'
  | 'time conflict'
  | 'crn does not exist'
  | 'prerequisite'
  | 'maximum hours exceeded';

// What the page shows for one CRN after a submit
export type PageSnapshot = {
  rowStatus: string | null;
  messages: string[];
};

export type SubmissionResult =
  | { crn: string; status: 'accepted'; messages: string[] }
  | { crn: string; status: 'rejected'; reason: string; messages: string[] }
  | { crn: string; status: 'not-attempted'; reason: string };

export type RegistrationRun = {
  results: SubmissionResult[];
  invalid: ValidationError[];
  fatal: PageStateError | null;
};

export type CampStop = 'settled' | 'fatal' | 'aborted' | 'exhausted' | 'invalid';

export type CampResult = RegistrationRun & {
  attempts: number;
  stoppedBy: CampStop;
};
