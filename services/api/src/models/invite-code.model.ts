/**
 * Invite Code Model
 * Schema for 'invite_codes' collection; the document id is the code itself
 */

import { z } from 'zod';
import type { Firestore } from '@google-cloud/firestore';
import { INVITE_CODES_COLLECTION, type InviteCode } from '../../../../shared/types';
import { FirestoreDateSchema } from './firestore-date';

export const InviteCodeSchema = z.object({
  code: z.string(),
  companyId: z.string(),
  role: z.enum(['company_admin', 'member']),
  createdBy: z.string(),
  usedBy: z.string().nullable().default(null),
  usedAt: FirestoreDateSchema.nullable().default(null),
  createdAt: FirestoreDateSchema,
});

export const inviteCodeConverter = {
  toFirestore: (data: InviteCode) => data,
  fromFirestore: (snapshot: FirebaseFirestore.QueryDocumentSnapshot): InviteCode =>
    InviteCodeSchema.parse({ ...snapshot.data(), code: snapshot.id }),
};

export function getInviteCodesCollection(db: Firestore) {
  return db.collection(INVITE_CODES_COLLECTION).withConverter(inviteCodeConverter);
}
