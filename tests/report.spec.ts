import { test, expect } from '@playwright/test';
import { PageStateError, ValidationError } from '../src/register/errors';
import { countResults, exitCodeFor, formatAttempt, formatResult, formatRun } from '../src/register/report';
import type { RegistrationRun } from '../src/register/types';

const mixed: RegistrationRun = {
  results: [
    { crn: '12345', status: 'accepted', messages: [] },
    { crn: '67890', status: 'rejected', reason: 'closed section', messages: ['Closed Section'] },
  ],
  invalid: [new ValidationError('abc')],
  fatal: null,
};

test('formatResult', () => {
  expect(formatResult({ crn: '12345', status: 'accepted', messages: [] })).toBe('12345  accepted');
  expect(formatResult({ crn: '67890', status: 'rejected', reason: 'closed section', messages: [] })).toBe(
    '67890  rejected (closed section)',
  );
  expect(formatResult({ crn: '11111', status: 'not-attempted', reason: 'page not ready' })).toBe(
    '11111  not attempted (page not ready)',
  );
});

test('countResults', () => {
  expect(countResults(mixed.results)).toEqual({ accepted: 1, rejected: 1, 'not-attempted': 0 });
});

test('formatRun lists skipped input, results and a summary', () => {
  expect(formatRun(mixed)).toEqual([
    'Skipped: Invalid CRN: "abc" (expected 5 digits)',
    '12345  accepted',
    '67890  rejected (closed section)',
    'accepted=1 rejected=1 not-attempted=0',
  ]);
});

test('formatRun ends with the abort reason', () => {
  const run: RegistrationRun = {
    results: [{ crn: '12345', status: 'not-attempted', reason: 'page not ready' }],
    invalid: [],
    fatal: new PageStateError('page not ready'),
  };
  expect(formatRun(run)).toEqual([
    '12345  not attempted (page not ready)',
    'accepted=0 rejected=0 not-attempted=1',
    'Aborted: page not ready',
  ]);
});

test('formatAttempt shows the first line of up to four distinct messages', () => {
  const run: RegistrationRun = {
    results: [
      { crn: '10001', status: 'rejected', reason: 'closed section', messages: ['Closed Section\nmore detail'] },
      { crn: '10002', status: 'rejected', reason: 'closed section', messages: ['Closed Section\nmore detail'] },
      { crn: '10003', status: 'rejected', reason: 'a', messages: ['a', 'b', 'c', 'd'] },
    ],
    invalid: [],
    fatal: null,
  };
  expect(formatAttempt(3, run)).toEqual([
    '[Attempt 3] accepted=0 rejected=3 not-attempted=0',
    'Messages:',
    ' - Closed Section',
    ' - a',
    ' - b',
    ' - c',
  ]);
});

test('exitCodeFor', () => {
  expect(exitCodeFor(mixed)).toBe(0);
  expect(exitCodeFor({ results: [], invalid: [new ValidationError('abc')], fatal: null })).toBe(2);
  expect(
    exitCodeFor({
      results: [{ crn: '12345', status: 'not-attempted', reason: 'x' }],
      invalid: [],
      fatal: new PageStateError('x'),
    }),
  ).toBe(1);
});

test('exitCodeFor is non-zero when a CRN was never attempted', () => {
  expect(
    exitCodeFor({
      results: [
        { crn: '12345', status: 'accepted', messages: [] },
        { crn: '67890', status: 'not-attempted', reason: 'stopped before this CRN was attempted' },
      ],
      invalid: [],
      fatal: null,
    }),
  ).toBe(1);
});
