/**
 * Dashboard aggregation over an already-scoped, date-descending expense list
 */

import type { DashboardSummary, Expense } from '../../../../../shared/types';
import { roundCurrency } from '../currency/currency-code';

export const RECENT_EXPENSES_LIMIT = 10;
export const UNKNOWN_MONTH = 'Unknown';

export type AmountField = 'totalHome' | 'totalUsd';

/**
 * Month bucket: the first seven characters of the stored date string, verbatim
 */
export function monthBucket(date: string): string {
  return date ? date.slice(0, 7) : UNKNOWN_MONTH;
}

function addTo(buckets: Record<string, number>, key: string, amount: number): void {
  buckets[key] = (buckets[key] ?? 0) + amount;
}

function roundValues(buckets: Record<string, number>): Record<string, number> {
  return Object.fromEntries(
    Object.entries(buckets).map(([key, value]) => [key, roundCurrency(value)])
  );
}

export function computeDashboard(
  expenses: Expense[],
  amountField: AmountField,
  currency: string
): DashboardSummary {
  let total = 0;
  const byCategory: Record<string, number> = {};
  const byMonth: Record<string, number> = {};
  const byUser: Record<string, number> = {};

  for (const expense of expenses) {
    const amount = expense[amountField];
    total += amount;
    addTo(byCategory, expense.category || 'Other', amount);
    addTo(byMonth, monthBucket(expense.date), amount);
    addTo(byUser, expense.uploadedBy || 'unknown', amount);
  }

  const sortedMonths = Object.fromEntries(
    Object.entries(byMonth).sort(([a], [b]) => a.localeCompare(b))
  );

  return {
    total: roundCurrency(total),
    count: expenses.length,
    byCategory: roundValues(byCategory),
    byMonth: roundValues(sortedMonths),
    byUser: roundValues(byUser),
    recent: expenses.slice(0, RECENT_EXPENSES_LIMIT),
    currency,
  };
}
