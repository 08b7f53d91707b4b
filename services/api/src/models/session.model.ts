/**
 * Session Model
 * Schema for 'sessions' collection. Documents are keyed by the SHA-256 of the
 * bearer token; the token itself is never written.
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import type { Firestore } from '@google-cloud/firestore';
import { SESSIONS_COLLECTION } from '../../../../shared/types';
import { FirestoreDateSchema } from './firestore-date';

export const SessionDocSchema = z.object({
  userId: z.string(),
  createdAt: FirestoreDateSchema,
  expiresAt: FirestoreDateSchema,
});

export type SessionDoc = z.infer<typeof SessionDocSchema>;

export const sessionConverter = {
  toFirestore: (data: SessionDoc) => data,
  fromFirestore: (snapshot: FirebaseFirestore.QueryDocumentSnapshot): SessionDoc =>
    SessionDocSchema.parse(snapshot.data()),
};

export function getSessionsCollection(db: Firestore) {
  return db.collection(SESSIONS_COLLECTION).withConverter(sessionConverter);
}

export function getSessionDocId(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}
