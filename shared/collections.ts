/**
 * Firestore collection names
 * Centralized constants to avoid hardcoding collection names across services
 */

// Tenant collections
export const COMPANIES_COLLECTION = 'companies';
export const USERS_COLLECTION = 'users';
export const INVITE_CODES_COLLECTION = 'invite_codes';
export const SESSIONS_COLLECTION = 'sessions';

// Ledger collections
export const EXPENSES_COLLECTION = 'expenses';

/**
 * Firestore caps a single batch at 500 writes
 */
export const MAX_BATCH_WRITES = 500;
