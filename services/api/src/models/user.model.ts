/**
 * User Model
 * Schema for 'users' collection. Emails are stored lower-cased so equality
 * queries double as case-insensitive lookups.
 */

import { z } from 'zod';
import type { Firestore } from '@google-cloud/firestore';
import { ROLES, USERS_COLLECTION, type User } from '../../../../shared/types';
import { FirestoreDateSchema } from './firestore-date';

export const UserSchema = z.object({
  id: z.string(),
  name: z.string(),
  email: z.string().transform((email) => email.toLowerCase()),
  passwordHash: z.string(),
  role: z.enum(ROLES),
  companyId: z.string().nullable().default(null),
  createdAt: FirestoreDateSchema,
});

export const userConverter = {
  toFirestore: (data: User) => data,
  fromFirestore: (snapshot: FirebaseFirestore.QueryDocumentSnapshot): User =>
    UserSchema.parse({ ...snapshot.data(), id: snapshot.id }),
};

export function getUsersCollection(db: Firestore) {
  return db.collection(USERS_COLLECTION).withConverter(userConverter);
}
