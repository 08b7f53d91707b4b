/**
 * Firestore Models
 * Type-safe schemas and converters for all Firestore collections
 */

export * from './company.model';
export * from './user.model';
export * from './invite-code.model';
export * from './session.model';
export * from './expense.model';
export * from './firestore-date';
