/**
 * Firestore user repository
 * First-user bootstrap and invite consumption run inside transactions so two
 * concurrent registrations can neither both become super admin nor share a code.
 */

import type { Firestore } from '@google-cloud/firestore';
import type { User } from '../../../../shared/types';
import { NotFoundError, ValidationError } from '../errors';
import { getInviteCodesCollection, getUsersCollection } from '../models';
import type { ScopeFilter } from '../services/access/access-policy.service';
import type { InvitedUserInput, UserRepository } from './repository.types';

export const INVALID_INVITE_MESSAGE = 'Invalid or already used invite code';
export const EMAIL_TAKEN_MESSAGE = 'Email already registered';

export class FirestoreUserRepository implements UserRepository {
  constructor(private firestore: Firestore) {}

  private get collection() {
    return getUsersCollection(this.firestore);
  }

  async findById(userId: string): Promise<User | null> {
    const doc = await this.collection.doc(userId).get();
    return doc.data() ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const snapshot = await this.collection.where('email', '==', email.toLowerCase()).limit(1).get();
    return snapshot.empty ? null : snapshot.docs[0].data();
  }

  async list(scope: ScopeFilter): Promise<User[]> {
    const query =
      scope.kind === 'company'
        ? this.collection.where('companyId', '==', scope.companyId)
        : this.collection;
    const snapshot = await query.get();
    return snapshot.docs
      .map((doc) => doc.data())
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  async countByCompany(companyId: string): Promise<number> {
    const snapshot = await this.collection.where('companyId', '==', companyId).count().get();
    return snapshot.data().count;
  }

  async createFirstUser(user: User): Promise<boolean> {
    return this.firestore.runTransaction(async (transaction) => {
      const existing = await transaction.get(this.collection.limit(1));
      if (!existing.empty) {
        return false;
      }
      transaction.set(this.collection.doc(user.id), user);
      return true;
    });
  }

  async createWithInvite(input: InvitedUserInput, inviteCode: string): Promise<User> {
    const inviteRef = getInviteCodesCollection(this.firestore).doc(inviteCode);
    const email = input.email.toLowerCase();

    return this.firestore.runTransaction(async (transaction) => {
      const [inviteDoc, sameEmail] = await Promise.all([
        transaction.get(inviteRef),
        transaction.get(this.collection.where('email', '==', email).limit(1)),
      ]);

      const invite = inviteDoc.data();
      if (!invite || invite.usedBy !== null) {
        throw new NotFoundError(INVALID_INVITE_MESSAGE);
      }
      if (!sameEmail.empty) {
        throw new ValidationError(EMAIL_TAKEN_MESSAGE);
      }

      const user: User = {
        ...input,
        email,
        role: invite.role,
        companyId: invite.companyId,
      };
      transaction.set(this.collection.doc(user.id), user);
      transaction.update(inviteRef, { usedBy: user.id, usedAt: input.createdAt });
      return user;
    });
  }

  async updatePasswordHash(userId: string, passwordHash: string): Promise<void> {
    await this.collection.doc(userId).update({ passwordHash });
  }

  async delete(userId: string): Promise<void> {
    await this.collection.doc(userId).delete();
  }
}
