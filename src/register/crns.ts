/**
 * crns.ts
 *
 * Parses and validates CRN input before anything touches the browser.
 */

import { ValidationError } from './errors';

const CRN_PATTERN = /^\d{5}$/;

export function isValidCrn(value: string): boolean {
  return CRN_PATTERN.test(value);
}

// Accepts "29626" or "29626, 12345 67890"
export function parseCrnInput(raw: string): string[] {
  return raw
    .replace(/,/g, ' ')
    .split(/\s+/)
    .map((s) => s.trim())
    .filter(Boolean);
}

// Splits a CRN list into the ones we can submit and one ValidationError per malformed entry.
// Input order is kept and duplicates stay separate attempts.
export function partitionCrns(list: readonly string[]): { valid: string[]; invalid: ValidationError[] } {
  const valid: string[] = [];
  const invalid: ValidationError[] = [];

  for (const entry of list) {
    const crn = entry.trim();
    if (isValidCrn(crn)) {
      valid.push(crn);
    } else {
      invalid.push(new ValidationError(entry));
    }
  }
  return { valid, invalid };
}
