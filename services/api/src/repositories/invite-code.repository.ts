/**
 * Firestore invite code repository
 */

import type { Firestore } from '@google-cloud/firestore';
import type { InviteCode } from '../../../../shared/types';
import { getInviteCodesCollection } from '../models';
import type { ScopeFilter } from '../services/access/access-policy.service';
import type { InviteCodeRepository } from './repository.types';

export class FirestoreInviteCodeRepository implements InviteCodeRepository {
  constructor(private firestore: Firestore) {}

  private get collection() {
    return getInviteCodesCollection(this.firestore);
  }

  async create(invite: InviteCode): Promise<void> {
    // create() fails if the code already exists instead of overwriting it
    await this.collection.doc(invite.code).create(invite);
  }

  async listPending(scope: ScopeFilter): Promise<InviteCode[]> {
    const unused = this.collection.where('usedBy', '==', null);
    const query =
      scope.kind === 'company' ? unused.where('companyId', '==', scope.companyId) : unused;
    const snapshot = await query.get();
    return snapshot.docs
      .map((doc) => doc.data())
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }
}
