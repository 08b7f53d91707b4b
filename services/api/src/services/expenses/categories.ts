/**
 * Expense category normalization
 */

import { EXPENSE_CATEGORIES, type ExpenseCategory } from '../../../../../shared/types';

/**
 * Map free text onto the closed category list (case-insensitive), else "Other"
 */
export function normalizeCategory(value: unknown): ExpenseCategory {
  if (typeof value !== 'string') {
    return 'Other';
  }
  const text = value.trim().toLowerCase();
  return EXPENSE_CATEGORIES.find((category) => category.toLowerCase() === text) ?? 'Other';
}
