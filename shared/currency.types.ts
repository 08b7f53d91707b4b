/**
 * Currency Types
 */

/**
 * Currency code to rate relative to USD (USD = 1)
 */
export type RateTable = Readonly<Record<string, number>>;

export interface ExchangeRateSnapshot {
  rates: RateTable;
  fetchedAt: number; // epoch ms
  source: 'live' | 'fallback';
}

export const REFERENCE_CURRENCY = 'USD';
