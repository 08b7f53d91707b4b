/**
 * Firestore-backed repositories
 */

import type { Firestore } from '@google-cloud/firestore';
import { FirestoreCompanyRepository } from './company.repository';
import { FirestoreExpenseRepository } from './expense.repository';
import { FirestoreInviteCodeRepository } from './invite-code.repository';
import type { Repositories } from './repository.types';
import { FirestoreSessionRepository } from './session.repository';
import { FirestoreUserRepository } from './user.repository';

export * from './repository.types';
export { byDateDescending } from './expense.repository';
export { EMAIL_TAKEN_MESSAGE, INVALID_INVITE_MESSAGE } from './user.repository';

export function createFirestoreRepositories(firestore: Firestore): Repositories {
  return {
    companies: new FirestoreCompanyRepository(firestore),
    users: new FirestoreUserRepository(firestore),
    inviteCodes: new FirestoreInviteCodeRepository(firestore),
    sessions: new FirestoreSessionRepository(firestore),
    expenses: new FirestoreExpenseRepository(firestore),
  };
}
