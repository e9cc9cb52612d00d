/**
 * banner.ts
 *
 * RegistrationPage backed by a live Playwright page parked on Banner's
 * "Register for Classes → Enter CRNs" screen.
 *
 * - navigates back to classRegistration if the tab wandered off
 * - clicks the Enter CRNs tab when it is clickable (already open otherwise)
 * - fills the next empty CRN row, adding a row when all are taken
 * - reads notification text and the summary row for a CRN
 *
 * Any Playwright failure here is rethrown as PageStateError.
 */

import { errors, type Locator, type Page } from '@playwright/test';
import { PageStateError } from './errors';
import { Logger } from './logger';
import type { RegistrationPage } from './page';
import { SELECTORS } from './selectors';
import type { PageSnapshot, RegisterConfig } from './types';

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message.split('\n')[0] : String(err);
}

export class BannerRegistrationPage implements RegistrationPage {
  constructor(
    private readonly page: Page,
    private readonly cfg: RegisterConfig,
  ) {}

  async ensureReady(): Promise<void> {
    if (!this.page.url().includes('classRegistration')) {
      Logger.info(`Not on the registration page, opening ${this.cfg.registerUrl}`);
      await this.guard('open the registration page', () =>
        this.page.goto(this.cfg.registerUrl, { waitUntil: 'domcontentloaded', timeout: this.cfg.readyTimeoutMs }),
      );
    }

    await this.clickEnterCrnsTabIfNeeded();

    await this.guard('find a CRN input (is the Enter CRNs screen open?)', () =>
      this.page.locator(SELECTORS.crnInputs).first().waitFor({ state: 'visible', timeout: this.cfg.readyTimeoutMs }),
    );
  }

  async dismissMessages(): Promise<void> {
    const buttons = this.page.locator(SELECTORS.dismissMessage);
    try {
      const count = await buttons.count();
      for (let i = count - 1; i >= 0; i--) {
        const button = buttons.nth(i);
        if (await button.isVisible()) await button.click({ timeout: this.cfg.tabTimeoutMs });
      }
    } catch (err) {
      // stale notifications only muddy the next snapshot, they don't stop the run
      Logger.warn(`Could not dismiss notifications: ${errorMessage(err)}`);
    }
  }

  async addCrn(crn: string): Promise<void> {
    const input = await this.guard('locate an empty CRN row', () => this.nextEmptyInput());
    await this.guard(`enter CRN ${crn}`, () => input.fill(crn, { timeout: this.cfg.readyTimeoutMs }));
    await this.guard('click Add to Summary', () => this.safeClick(SELECTORS.addToSummary));
  }

  async submit(): Promise<void> {
    await this.guard('click Submit', () => this.safeClick(SELECTORS.submit));
  }

  async readSnapshot(crn: string): Promise<PageSnapshot> {
    return this.guard('read the page status', async () => {
      const messages: string[] = [];
      for (const text of await this.page.locator(SELECTORS.messages).allInnerTexts()) {
        const trimmed = text.trim();
        if (trimmed && !messages.includes(trimmed)) messages.push(trimmed);
      }

      const row = this.page.locator(SELECTORS.summaryRows).filter({ hasText: crn }).last();
      const rowStatus =
        (await row.count()) > 0
          ? (await row.innerText({ timeout: this.cfg.readyTimeoutMs })).replace(/\s+/g, ' ').trim()
          : null;

      return { rowStatus: rowStatus || null, messages };
    });
  }

  async pause(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  async reload(): Promise<void> {
    await this.guard('reload the registration page', () =>
      this.page.reload({ waitUntil: 'domcontentloaded', timeout: this.cfg.readyTimeoutMs }),
    );
  }

  private async clickEnterCrnsTabIfNeeded(): Promise<void> {
    try {
      await this.safeClick(SELECTORS.enterCrnsTab, this.cfg.tabTimeoutMs);
    } catch (err) {
      // already on it, or not clickable in the current layout state
      if (!(err instanceof errors.TimeoutError)) {
        throw new PageStateError(`Could not open the Enter CRNs tab: ${errorMessage(err)}`, { cause: err });
      }
      Logger.debug('Enter CRNs tab not clickable, assuming it is already open');
    }
  }

  private async nextEmptyInput(): Promise<Locator> {
    const inputs = this.page.locator(SELECTORS.crnInputs);
    await inputs.first().waitFor({ state: 'visible', timeout: this.cfg.readyTimeoutMs });

    const empty = await this.firstEmpty(inputs);
    if (empty) return empty;

    const before = await inputs.count();
    await this.safeClick(SELECTORS.addAnotherCrn);
    await inputs.nth(before).waitFor({ state: 'visible', timeout: this.cfg.readyTimeoutMs });

    const added = await this.firstEmpty(inputs);
    if (!added) throw new PageStateError('No empty CRN row after clicking Add Another CRN');
    return added;
  }

  private async firstEmpty(inputs: Locator): Promise<Locator | null> {
    const count = await inputs.count();
    for (let i = 0; i < count; i++) {
      const input = inputs.nth(i);
      if (!(await input.isVisible())) continue;
      if ((await input.inputValue()) === '') return input;
    }
    return null;
  }

  private async safeClick(selector: string, timeout = this.cfg.readyTimeoutMs): Promise<void> {
    const el = this.page.locator(selector).first();
    await el.waitFor({ state: 'visible', timeout });
    await el.scrollIntoViewIfNeeded({ timeout });
    await el.click({ timeout });
  }

  private async guard<T>(what: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (err) {
      if (err instanceof PageStateError) throw err;
      throw new PageStateError(`Could not ${what}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
