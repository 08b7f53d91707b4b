/**
 * Expense Model
 * Schema for 'expenses' collection
 */

import { z } from 'zod';
import type { Firestore } from '@google-cloud/firestore';
import { EXPENSES_COLLECTION, type Expense } from '../../../../shared/types';
import { normalizeCategory } from '../services/expenses/categories';
import { FirestoreDateSchema } from './firestore-date';

// Stored rows are read as-is; the non-negative rule is enforced when writing
const amount = z.number().default(0);
const text = z.string().default('');

export const ExpenseSchema = z.object({
  id: z.string(),
  date: text,
  vendor: text,
  location: text,
  category: z.string().default('Other').transform(normalizeCategory),
  subtotal: amount,
  tax: amount,
  tip: amount,
  total: amount,
  paymentMethod: text,
  currency: z.string().default('USD'),
  totalHome: z.number().default(0),
  totalUsd: z.number().default(0),
  items: text,
  uploadedBy: text,
  uploadedById: text,
  // Rows without a company predate multi-tenancy
  companyId: z.string().nullable().default(null),
  receiptImage: text,
  createdAt: FirestoreDateSchema,
});

export const expenseConverter = {
  toFirestore: (data: Expense) => data,
  fromFirestore: (snapshot: FirebaseFirestore.QueryDocumentSnapshot): Expense =>
    ExpenseSchema.parse({ ...snapshot.data(), id: snapshot.id }),
};

export function getExpensesCollection(db: Firestore) {
  return db.collection(EXPENSES_COLLECTION).withConverter(expenseConverter);
}
