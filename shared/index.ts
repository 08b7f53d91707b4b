/**
 * Shared Types - Barrel Export
 *
 * Re-exports all types from domain-specific modules.
 *
 * @example
 * import { Expense, Identity, ReceiptExtraction } from '../shared';
 */

// Companies, users, invites, sessions
export * from './tenant.types';

// Expense ledger
export * from './expense.types';

// Document normalization and extraction
export * from './extraction.types';

// Exchange rates
export * from './currency.types';

// Firestore collection names
export * from './collections';
