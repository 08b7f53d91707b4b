/**
 * Currency Conversion Service
 *
 * Owns the process-wide exchange rate cache. Rates are USD-relative and fetched from a
 * single JSON source; a fresh snapshot short-circuits the network entirely. Refreshes
 * are single-flight and replace the snapshot object as a whole, so concurrent readers
 * see either the old table or the new one, never a mix.
 *
 * Failure policy: stale snapshot if one exists, otherwise the hardcoded table. convert()
 * never throws because the rate source is down.
 */

import { z } from 'zod';
import {
  REFERENCE_CURRENCY,
  type ExchangeRateSnapshot,
  type RateTable,
} from '../../../../../shared/types';
import { RateFetchDegradedError, errorMessage } from '../../errors';
import logger from '../../logger';
import { normalizeCurrencyCode, roundCurrency } from './currency-code';
import { FALLBACK_RATES } from './fallback-rates';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface CurrencyServiceOptions {
  sourceUrl: string;
  cacheTtlMs: number;
  retryBackoffMs: number;
  timeoutMs: number;
  fetch?: FetchFn;
  now?: () => number;
}

const RateResponseSchema = z.object({
  rates: z.record(z.string(), z.number()),
});

/**
 * Rate of a currency against USD; unknown codes and unusable rates count as 1
 */
export function rateFor(rates: RateTable, currency: string): number {
  const rate = rates[currency];
  return typeof rate === 'number' && Number.isFinite(rate) && rate > 0 ? rate : 1;
}

/**
 * Convert through USD as pivot with an already-resolved rate table
 */
export function convertWithRates(
  amount: number,
  fromCurrency: string,
  toCurrency: string,
  rates: RateTable
): number {
  const from = normalizeCurrencyCode(fromCurrency);
  const to = normalizeCurrencyCode(toCurrency);

  if (from === to || amount === 0) {
    return roundCurrency(amount);
  }

  const amountUsd = amount / rateFor(rates, from);
  return roundCurrency(amountUsd * rateFor(rates, to));
}

export class CurrencyService {
  private snapshot: ExchangeRateSnapshot | null = null;
  private lastFailureAt: number | null = null;
  private inflight: Promise<ExchangeRateSnapshot> | null = null;

  private readonly fetchFn: FetchFn;
  private readonly now: () => number;

  constructor(private readonly options: CurrencyServiceOptions) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
  }

  /**
   * Convert an amount between currencies, rounded to cents
   */
  async convert(amount: number, fromCurrency: string, toCurrency: string): Promise<number> {
    const from = normalizeCurrencyCode(fromCurrency);
    const to = normalizeCurrencyCode(toCurrency);

    // Identity and zero conversions never touch the network
    if (from === to || amount === 0) {
      return roundCurrency(amount);
    }

    const { rates } = await this.getRates();
    return convertWithRates(amount, from, to, rates);
  }

  /**
   * Convert one billed total into the home and reference currencies
   */
  async convertTotals(
    amount: number,
    billedCurrency: string,
    homeCurrency: string
  ): Promise<{ totalHome: number; totalUsd: number }> {
    const [totalHome, totalUsd] = await Promise.all([
      this.convert(amount, billedCurrency, homeCurrency),
      this.convert(amount, billedCurrency, REFERENCE_CURRENCY),
    ]);
    return { totalHome, totalUsd };
  }

  /**
   * Current rate table: cached while fresh, refreshed when stale, degraded on failure
   */
  async getRates(): Promise<ExchangeRateSnapshot> {
    const now = this.now();

    if (this.snapshot && now - this.snapshot.fetchedAt < this.options.cacheTtlMs) {
      return this.snapshot;
    }

    // Source failed recently: don't hammer it on every conversion
    if (this.lastFailureAt !== null && now - this.lastFailureAt < this.options.retryBackoffMs) {
      return this.degradedSnapshot();
    }

    if (!this.inflight) {
      this.inflight = this.refresh().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async refresh(): Promise<ExchangeRateSnapshot> {
    try {
      const rates = await this.fetchLiveRates();
      const snapshot: ExchangeRateSnapshot = { rates, fetchedAt: this.now(), source: 'live' };
      this.snapshot = snapshot;
      this.lastFailureAt = null;

      logger.info({ currencies: Object.keys(rates).length }, 'Refreshed exchange rates');
      return snapshot;
    } catch (error) {
      this.lastFailureAt = this.now();
      const degraded =
        error instanceof RateFetchDegradedError
          ? error
          : new RateFetchDegradedError(errorMessage(error), error);

      logger.warn(
        {
          kind: degraded.kind,
          error: degraded.message,
          serving: this.snapshot ? 'stale' : 'fallback',
        },
        'Exchange rate refresh failed'
      );
      return this.degradedSnapshot();
    }
  }

  private degradedSnapshot(): ExchangeRateSnapshot {
    return this.snapshot ?? { rates: FALLBACK_RATES, fetchedAt: this.now(), source: 'fallback' };
  }

  private async fetchLiveRates(): Promise<RateTable> {
    let response: Response;
    try {
      response = await this.fetchFn(this.options.sourceUrl, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new RateFetchDegradedError(`Exchange rate request failed: ${errorMessage(error)}`, error);
    }

    if (!response.ok) {
      throw new RateFetchDegradedError(`Exchange rate source returned HTTP ${response.status}`);
    }

    const parsed = RateResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new RateFetchDegradedError('Exchange rate source returned an unexpected payload');
    }

    const rates: Record<string, number> = {};
    for (const [code, rate] of Object.entries(parsed.data.rates)) {
      rates[code.toUpperCase()] = rate;
    }
    rates[REFERENCE_CURRENCY] = 1;

    return Object.freeze(rates);
  }
}
