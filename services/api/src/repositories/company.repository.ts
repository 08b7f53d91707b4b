/**
 * Firestore company repository
 */

import type { DocumentReference, Firestore } from '@google-cloud/firestore';
import type { Company } from '../../../../shared/types';
import {
  getCompaniesCollection,
  getExpensesCollection,
  getInviteCodesCollection,
  getUsersCollection,
} from '../models';
import logger from '../logger';
import { deleteInBatches } from './firestore-batch';
import type {
  CompanyChanges,
  CompanyDeletionResult,
  CompanyRepository,
} from './repository.types';

export class FirestoreCompanyRepository implements CompanyRepository {
  constructor(private firestore: Firestore) {}

  private get collection() {
    return getCompaniesCollection(this.firestore);
  }

  async findById(companyId: string): Promise<Company | null> {
    const doc = await this.collection.doc(companyId).get();
    return doc.data() ?? null;
  }

  async list(): Promise<Company[]> {
    const snapshot = await this.collection.orderBy('name').get();
    return snapshot.docs.map((doc) => doc.data());
  }

  async create(company: Company): Promise<void> {
    await this.collection.doc(company.id).set(company);
  }

  async update(companyId: string, changes: CompanyChanges): Promise<void> {
    await this.collection.doc(companyId).update(changes);
  }

  async deleteCascade(companyId: string): Promise<CompanyDeletionResult> {
    const log = logger.child({ companyId, operation: 'deleteCompanyCascade' });

    const [users, expenses, invites] = await Promise.all([
      getUsersCollection(this.firestore).where('companyId', '==', companyId).get(),
      getExpensesCollection(this.firestore).where('companyId', '==', companyId).get(),
      getInviteCodesCollection(this.firestore).where('companyId', '==', companyId).get(),
    ]);

    // Used codes stay behind as the record of who joined through them
    const unusedInvites = invites.docs.filter((doc) => doc.data().usedBy === null);

    const refs: DocumentReference[] = [
      ...expenses.docs.map((doc) => doc.ref),
      ...users.docs.map((doc) => doc.ref),
      ...unusedInvites.map((doc) => doc.ref),
    ];
    await deleteInBatches(this.firestore, refs);
    // Company document last, so an interrupted cascade can be re-run
    await this.collection.doc(companyId).delete();

    const result: CompanyDeletionResult = {
      users: users.size,
      expenses: expenses.size,
      inviteCodes: unusedInvites.length,
      receiptImages: expenses.docs
        .map((doc) => doc.data().receiptImage)
        .filter((image) => image.length > 0),
    };
    log.info(
      { users: result.users, expenses: result.expenses, inviteCodes: result.inviteCodes },
      'Deleted company and its data'
    );
    return result;
  }
}
