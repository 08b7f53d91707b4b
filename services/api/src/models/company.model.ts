/**
 * Company Model
 * Schema for 'companies' collection (tenants)
 */

import { z } from 'zod';
import type { Firestore } from '@google-cloud/firestore';
import { COMPANIES_COLLECTION, type Company } from '../../../../shared/types';
import { FirestoreDateSchema } from './firestore-date';

export const CompanySchema = z.object({
  id: z.string(),
  name: z.string(),
  homeCurrency: z.string().length(3).default('USD'),
  createdAt: FirestoreDateSchema,
});

export const companyConverter = {
  toFirestore: (data: Company) => data,
  fromFirestore: (snapshot: FirebaseFirestore.QueryDocumentSnapshot): Company =>
    CompanySchema.parse({ ...snapshot.data(), id: snapshot.id }),
};

export function getCompaniesCollection(db: Firestore) {
  return db.collection(COMPANIES_COLLECTION).withConverter(companyConverter);
}
