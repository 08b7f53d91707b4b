/**
 * Firestore expense repository
 */

import type { Firestore } from '@google-cloud/firestore';
import {
  MAX_BATCH_WRITES,
  type ConvertedTotals,
  type Expense,
  type ExpensePatch,
} from '../../../../shared/types';
import { getExpensesCollection } from '../models';
import type { ScopeFilter } from '../services/access/access-policy.service';
import type { ExpenseRepository, ExpenseStats } from './repository.types';

export function byDateDescending(a: Expense, b: Expense): number {
  return b.date.localeCompare(a.date);
}

export class FirestoreExpenseRepository implements ExpenseRepository {
  constructor(private firestore: Firestore) {}

  private get collection() {
    return getExpensesCollection(this.firestore);
  }

  async create(expense: Expense): Promise<void> {
    await this.collection.doc(expense.id).set(expense);
  }

  async findById(expenseId: string): Promise<Expense | null> {
    const doc = await this.collection.doc(expenseId).get();
    return doc.data() ?? null;
  }

  async list(scope: ScopeFilter): Promise<Expense[]> {
    const query =
      scope.kind === 'company'
        ? this.collection.where('companyId', '==', scope.companyId)
        : this.collection;
    const snapshot = await query.get();
    // Sorted in memory; there is no composite (companyId, date) index
    return snapshot.docs.map((doc) => doc.data()).sort(byDateDescending);
  }

  async update(expenseId: string, patch: ExpensePatch): Promise<void> {
    await this.collection.doc(expenseId).update(patch);
  }

  async delete(expenseId: string): Promise<void> {
    await this.collection.doc(expenseId).delete();
  }

  async setConvertedTotals(totals: ConvertedTotals[]): Promise<number> {
    for (let start = 0; start < totals.length; start += MAX_BATCH_WRITES) {
      const batch = this.firestore.batch();
      for (const { id, totalHome, totalUsd } of totals.slice(start, start + MAX_BATCH_WRITES)) {
        batch.update(this.collection.doc(id), { totalHome, totalUsd });
      }
      await batch.commit();
    }
    return totals.length;
  }

  async statsByCompany(companyId: string): Promise<ExpenseStats> {
    const snapshot = await this.collection.where('companyId', '==', companyId).get();
    const totalUsd = snapshot.docs.reduce((sum, doc) => sum + doc.data().totalUsd, 0);
    return { count: snapshot.size, totalUsd };
  }
}
