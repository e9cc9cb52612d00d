/**
 * run.spec.ts
 *
 * Registration pass against the in-process fake page (no browser).
 */

import { test, expect } from '@playwright/test';
import { getDefaultConfig } from '../src/register/config';
import { PageStateError, ValidationError } from '../src/register/errors';
import { runRegistration } from '../src/register/run';
import { FakeRegistrationPage } from './support/fakeRegistrationPage';

const cfg = getDefaultConfig();

// Banner sometimes leaves alert regions up that the close buttons don't reach
class StickyMessagesPage extends FakeRegistrationPage {
  async dismissMessages(): Promise<void> {
    this.actions.push('dismissMessages');
  }
}

test.describe('runRegistration', () => {
  test('accepts an open section and rejects a full one', async () => {
    const page = new FakeRegistrationPage({ seats: { '12345': 1, '67890': 0 } });

    const run = await runRegistration(page, ['12345', '67890'], cfg);

    expect(run.results).toEqual([
      { crn: '12345', status: 'accepted', messages: [] },
      { crn: '67890', status: 'rejected', reason: 'closed section', messages: ['Closed Section'] },
    ]);
    expect(run.invalid).toEqual([]);
    expect(run.fatal).toBeNull();
  });

  test('does not blame a message left over from an earlier CRN on the next one', async () => {
    const page = new StickyMessagesPage({ seats: { '12345': 0, '67890': 1 } });

    const run = await runRegistration(page, ['12345', '67890'], cfg);

    expect(run.results).toEqual([
      { crn: '12345', status: 'rejected', reason: 'closed section', messages: ['Closed Section'] },
      { crn: '67890', status: 'accepted', messages: [] },
    ]);
    expect(page.registered.has('67890')).toBe(true);
  });

  test('drives each CRN through dismiss, add and submit in order', async () => {
    const page = new FakeRegistrationPage({ seats: { '12345': 1, '67890': 1 } });

    await runRegistration(page, ['12345', '67890'], cfg);

    expect(page.actions).toEqual([
      'ensureReady',
      'dismissMessages',
      'addCrn:12345',
      'submit',
      'dismissMessages',
      'addCrn:67890',
      'submit',
    ]);
    // add delay + submit settle per CRN, outcome already visible on the first snapshot
    expect(page.pausedMs).toBe(2 * (cfg.addDelayMs + cfg.submitSettleMs));
  });

  test('rejects a malformed CRN without touching the page', async () => {
    const page = new FakeRegistrationPage({ seats: { '12345': 1 } });

    const run = await runRegistration(page, ['abc'], cfg);

    expect(run.results).toEqual([]);
    expect(run.invalid).toHaveLength(1);
    expect(run.invalid[0]).toBeInstanceOf(ValidationError);
    expect(run.invalid[0].input).toBe('abc');
    expect(run.fatal).toBeNull();
    expect(page.actions).toEqual([]);
  });

  test('skips malformed CRNs and submits the rest in order', async () => {
    const page = new FakeRegistrationPage({ seats: { '12345': 1, '67890': 1 } });

    const run = await runRegistration(page, ['12345', '1234', '67890', '12a45'], cfg);

    expect(run.results.map((r) => [r.crn, r.status])).toEqual([
      ['12345', 'accepted'],
      ['67890', 'accepted'],
    ]);
    expect(run.invalid.map((e) => e.input)).toEqual(['1234', '12a45']);
    expect(page.actions.filter((a) => a.startsWith('addCrn:'))).toEqual(['addCrn:12345', 'addCrn:67890']);
  });

  test('marks every CRN not-attempted when the page is not ready', async () => {
    const page = new FakeRegistrationPage({ seats: { '12345': 1, '67890': 1 }, ready: false });

    const run = await runRegistration(page, ['12345', '67890'], cfg);

    const reason = 'Could not find a CRN input (is the Enter CRNs screen open?)';
    expect(run.results).toEqual([
      { crn: '12345', status: 'not-attempted', reason },
      { crn: '67890', status: 'not-attempted', reason },
    ]);
    expect(run.fatal).toBeInstanceOf(PageStateError);
    expect(page.submissions).toBe(0);
    expect(page.actions).toEqual(['ensureReady']);
  });

  test('re-running a CRN that already went through reports a duplicate', async () => {
    const page = new FakeRegistrationPage({ seats: { '12345': 3 } });

    const first = await runRegistration(page, ['12345'], cfg);
    const second = await runRegistration(page, ['12345'], cfg);

    expect(first.results).toEqual([{ crn: '12345', status: 'accepted', messages: [] }]);
    expect(second.results).toEqual([
      { crn: '12345', status: 'rejected', reason: 'duplicate', messages: ['Duplicate CRN 12345'] },
    ]);
    expect(second.fatal).toBeNull();
  });

  test('treats a repeated CRN as two independent attempts', async () => {
    const page = new FakeRegistrationPage({ seats: { '12345': 5 } });

    const run = await runRegistration(page, ['12345', '12345'], cfg);

    expect(run.results.map((r) => r.status)).toEqual(['accepted', 'rejected']);
    expect(run.results[1]).toMatchObject({ reason: 'duplicate' });
    expect(page.submissions).toBe(2);
  });

  test('stops touching the page after a mid-run PageStateError', async () => {
    const page = new FakeRegistrationPage({
      seats: { '11111': 1, '22222': 1, '33333': 1 },
      breakOn: { crn: '22222', step: 'submit' },
    });

    const run = await runRegistration(page, ['11111', '22222', '33333'], cfg);

    expect(run.results).toEqual([
      { crn: '11111', status: 'accepted', messages: [] },
      { crn: '22222', status: 'not-attempted', reason: 'Could not click Submit' },
      { crn: '33333', status: 'not-attempted', reason: 'Could not click Submit' },
    ]);
    expect(run.fatal?.message).toBe('Could not click Submit');
    expect(page.submissions).toBe(1);
    expect(page.actions).not.toContain('addCrn:33333');
  });

  test('reports a CRN the page never answered for', async () => {
    const page = new FakeRegistrationPage({ seats: { '12345': 1 }, silent: ['12345'] });

    const run = await runRegistration(page, ['12345'], cfg);

    expect(run.results).toEqual([
      { crn: '12345', status: 'rejected', reason: 'no confirmation shown', messages: [] },
    ]);
    expect(page.pausedMs).toBe(cfg.addDelayMs + cfg.submitSettleMs + cfg.outcomeTimeoutMs);
  });

  test('reports an unknown CRN', async () => {
    const page = new FakeRegistrationPage({ seats: {} });

    const run = await runRegistration(page, ['99999'], cfg);

    expect(run.results).toEqual([
      { crn: '99999', status: 'rejected', reason: 'crn does not exist', messages: ['Invalid CRN 99999'] },
    ]);
  });

  test('lets errors other than PageStateError propagate', async () => {
    const page = new FakeRegistrationPage({ seats: { '12345': 1 }, crashOn: '12345' });

    await expect(runRegistration(page, ['12345'], cfg)).rejects.toThrow('fake crashed');
  });

  test('returns one result per valid CRN, in input order', async () => {
    const lists = [['10001'], ['10001', '10002', '10003'], ['10003', '10001', '10003', '10002', '10001']];

    for (const crns of lists) {
      const page = new FakeRegistrationPage({ seats: { '10001': 1, '10002': 0 } });
      const run = await runRegistration(page, crns, cfg);
      expect(run.results.map((r) => r.crn)).toEqual(crns);
    }
  });
});
