/**
 * page.ts
 *
 * The registration page as the driver sees it. Markup knowledge stays behind this
 * interface (see banner.ts / selectors.ts) so a layout change is a single local update.
 * Every method throws PageStateError when the element it needs can't be found in time.
 */

import type { PageSnapshot } from './types';

export interface RegistrationPage {
  // make sure we're on the Enter CRNs screen with an input available
  ensureReady(): Promise<void>;
  // clear notifications left over from a previous CRN
  dismissMessages(): Promise<void>;
  // type the CRN into the next empty row and add it to the summary
  addCrn(crn: string): Promise<void>;
  submit(): Promise<void>;
  readSnapshot(crn: string): Promise<PageSnapshot>;
  pause(ms: number): Promise<void>;
  reload(): Promise<void>;
}
