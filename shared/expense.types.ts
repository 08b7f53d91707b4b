/**
 * Expense Ledger Types
 * Stored expense records, editable fields and dashboard aggregates
 */

export const EXPENSE_CATEGORIES = [
  'Food & Dining',
  'Groceries',
  'Air Travel',
  'Cab & Rideshare',
  'Hotel & Accommodation',
  'Shopping & Retail',
  'Utilities',
  'Entertainment',
  'Office & Business',
  'Healthcare',
  'Fuel & Parking',
  'Other',
] as const;

export type ExpenseCategory = (typeof EXPENSE_CATEGORIES)[number];

export interface Expense {
  id: string;
  date: string; // free text, YYYY-MM-DD or ''
  vendor: string;
  location: string;
  category: ExpenseCategory;
  subtotal: number;
  tax: number;
  tip: number;
  total: number; // billed currency
  paymentMethod: string;
  currency: string; // billed currency code
  totalHome: number; // company home currency
  totalUsd: number; // reference currency
  items: string;
  uploadedBy: string; // uploader display name
  uploadedById: string;
  companyId: string | null; // null = legacy/unassigned, super admin only
  receiptImage: string;
  createdAt: Date;
}

/**
 * Fields the edit path may change; converted totals are only written by recalculation
 */
export const EDITABLE_EXPENSE_FIELDS = [
  'date',
  'vendor',
  'location',
  'category',
  'subtotal',
  'tax',
  'tip',
  'total',
  'paymentMethod',
  'currency',
  'items',
] as const;

export type EditableExpenseField = (typeof EDITABLE_EXPENSE_FIELDS)[number];
export type ExpensePatch = Partial<Pick<Expense, EditableExpenseField>>;

export interface ConvertedTotals {
  id: string;
  totalHome: number;
  totalUsd: number;
}

export interface DashboardSummary {
  total: number;
  count: number;
  byCategory: Record<string, number>;
  byMonth: Record<string, number>;
  byUser: Record<string, number>;
  recent: Expense[];
  currency: string;
}

export interface RecalculationResult {
  companyId: string | null;
  homeCurrency: string;
  updated: number;
}
