/**
 * Repository contracts
 * Services depend on these interfaces only; Firestore implementations live beside
 * them and tests swap in in-memory fakes.
 */

import type {
  Company,
  ConvertedTotals,
  Expense,
  ExpensePatch,
  InviteCode,
  Session,
  User,
} from '../../../../shared/types';
import type { ScopeFilter } from '../services/access/access-policy.service';

export type CompanyChanges = Partial<Pick<Company, 'name' | 'homeCurrency'>>;

export interface CompanyDeletionResult {
  users: number;
  expenses: number;
  inviteCodes: number;
  receiptImages: string[];
}

export interface CompanyRepository {
  findById(companyId: string): Promise<Company | null>;
  /** All companies, ordered by name */
  list(): Promise<Company[]>;
  create(company: Company): Promise<void>;
  update(companyId: string, changes: CompanyChanges): Promise<void>;
  /** Hard delete of the company, its users, its expenses and its unused invite codes */
  deleteCascade(companyId: string): Promise<CompanyDeletionResult>;
}

/** Fields supplied by registration; role and company come from the invite */
export type InvitedUserInput = Pick<User, 'id' | 'name' | 'email' | 'passwordHash' | 'createdAt'>;

export interface UserRepository {
  findById(userId: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  /** Users within scope, ordered by creation time */
  list(scope: ScopeFilter): Promise<User[]>;
  countByCompany(companyId: string): Promise<number>;
  /**
   * Insert the user only if no user exists yet.
   * @returns false when another user already exists
   */
  createFirstUser(user: User): Promise<boolean>;
  /**
   * Consume an unused invite code and insert the user in one transaction
   * @throws NotFoundError for an unknown or used code
   */
  createWithInvite(input: InvitedUserInput, inviteCode: string): Promise<User>;
  updatePasswordHash(userId: string, passwordHash: string): Promise<void>;
  delete(userId: string): Promise<void>;
}

export interface InviteCodeRepository {
  create(invite: InviteCode): Promise<void>;
  /** Unused codes within scope, newest first */
  listPending(scope: ScopeFilter): Promise<InviteCode[]>;
}

export interface SessionRepository {
  create(session: Session): Promise<void>;
  find(token: string): Promise<Session | null>;
  delete(token: string): Promise<void>;
  deleteForUser(userId: string): Promise<number>;
}

export interface ExpenseStats {
  count: number;
  totalUsd: number;
}

export interface ExpenseRepository {
  create(expense: Expense): Promise<void>;
  findById(expenseId: string): Promise<Expense | null>;
  /** Expenses within scope, ordered by date string descending */
  list(scope: ScopeFilter): Promise<Expense[]>;
  update(expenseId: string, patch: ExpensePatch): Promise<void>;
  delete(expenseId: string): Promise<void>;
  /** Overwrite only totalHome/totalUsd, in batches */
  setConvertedTotals(totals: ConvertedTotals[]): Promise<number>;
  statsByCompany(companyId: string): Promise<ExpenseStats>;
}

export interface Repositories {
  companies: CompanyRepository;
  users: UserRepository;
  inviteCodes: InviteCodeRepository;
  sessions: SessionRepository;
  expenses: ExpenseRepository;
}
