/**
 * Firestore session repository
 */

import type { Firestore } from '@google-cloud/firestore';
import type { Session } from '../../../../shared/types';
import { getSessionDocId, getSessionsCollection } from '../models';
import { deleteInBatches } from './firestore-batch';
import type { SessionRepository } from './repository.types';

export class FirestoreSessionRepository implements SessionRepository {
  constructor(private firestore: Firestore) {}

  private get collection() {
    return getSessionsCollection(this.firestore);
  }

  async create(session: Session): Promise<void> {
    const { token, ...doc } = session;
    await this.collection.doc(getSessionDocId(token)).set(doc);
  }

  async find(token: string): Promise<Session | null> {
    const doc = await this.collection.doc(getSessionDocId(token)).get();
    const data = doc.data();
    return data ? { token, ...data } : null;
  }

  async delete(token: string): Promise<void> {
    await this.collection.doc(getSessionDocId(token)).delete();
  }

  async deleteForUser(userId: string): Promise<number> {
    const snapshot = await this.collection.where('userId', '==', userId).get();
    return deleteInBatches(
      this.firestore,
      snapshot.docs.map((doc) => doc.ref)
    );
  }
}
