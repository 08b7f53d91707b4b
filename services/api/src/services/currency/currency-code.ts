/**
 * Currency code handling
 *
 * Codes are normalized to upper-case 3-letter form. Well-formed but unknown codes are
 * kept as-is and later converted at rate 1 (treated like USD) so a mistyped code never
 * blocks ingestion. Whether that leniency is desired product behavior is still open.
 */

import { REFERENCE_CURRENCY } from '../../../../../shared/types';

const CURRENCY_CODE_PATTERN = /^[A-Z]{3}$/;

export function isCurrencyCode(value: string): boolean {
  return CURRENCY_CODE_PATTERN.test(value.trim().toUpperCase());
}

/**
 * Normalize a free-form code; empty or malformed input falls back to USD
 */
export function normalizeCurrencyCode(value: string | null | undefined, fallback = REFERENCE_CURRENCY): string {
  const code = (value ?? '').trim().toUpperCase();
  return CURRENCY_CODE_PATTERN.test(code) ? code : fallback;
}

/**
 * Round to cents, half away from zero
 */
export function roundCurrency(amount: number): number {
  const rounded = Math.round((Math.abs(amount) + Number.EPSILON) * 100) / 100;
  return Math.sign(amount) * rounded || 0;
}
