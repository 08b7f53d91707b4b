/**
 * Hardcoded USD-relative rates served when the live source has never answered
 */

import type { RateTable } from '../../../../../shared/types';

export const FALLBACK_RATES: RateTable = Object.freeze({
  USD: 1,
  CAD: 1.36,
  EUR: 0.92,
  GBP: 0.79,
  INR: 83.5,
  AUD: 1.53,
  JPY: 149.5,
  CHF: 0.88,
  SGD: 1.34,
  AED: 3.67,
});
