/**
 * In-process stand-ins for the Firestore repositories
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
import { NotFoundError, ValidationError } from '../../src/errors';
import {
  EMAIL_TAKEN_MESSAGE,
  INVALID_INVITE_MESSAGE,
  byDateDescending,
  type CompanyChanges,
  type CompanyDeletionResult,
  type CompanyRepository,
  type ExpenseRepository,
  type ExpenseStats,
  type InviteCodeRepository,
  type InvitedUserInput,
  type Repositories,
  type SessionRepository,
  type UserRepository,
} from '../../src/repositories';
import type { ScopeFilter } from '../../src/services/access/access-policy.service';

function inScope(scope: ScopeFilter, companyId: string | null): boolean {
  return scope.kind === 'all' || scope.companyId === companyId;
}

export class InMemoryExpenseRepository implements ExpenseRepository {
  readonly rows = new Map<string, Expense>();

  async create(expense: Expense): Promise<void> {
    this.rows.set(expense.id, { ...expense });
  }

  async findById(expenseId: string): Promise<Expense | null> {
    const row = this.rows.get(expenseId);
    return row ? { ...row } : null;
  }

  async list(scope: ScopeFilter): Promise<Expense[]> {
    return [...this.rows.values()]
      .filter((row) => inScope(scope, row.companyId))
      .map((row) => ({ ...row }))
      .sort(byDateDescending);
  }

  async update(expenseId: string, patch: ExpensePatch): Promise<void> {
    const row = this.rows.get(expenseId);
    if (!row) {
      throw new Error(`No expense ${expenseId}`);
    }
    this.rows.set(expenseId, { ...row, ...patch });
  }

  async delete(expenseId: string): Promise<void> {
    this.rows.delete(expenseId);
  }

  async setConvertedTotals(totals: ConvertedTotals[]): Promise<number> {
    for (const { id, totalHome, totalUsd } of totals) {
      const row = this.rows.get(id);
      if (row) {
        this.rows.set(id, { ...row, totalHome, totalUsd });
      }
    }
    return totals.length;
  }

  async statsByCompany(companyId: string): Promise<ExpenseStats> {
    const rows = [...this.rows.values()].filter((row) => row.companyId === companyId);
    return { count: rows.length, totalUsd: rows.reduce((sum, row) => sum + row.totalUsd, 0) };
  }
}

export class InMemoryInviteCodeRepository implements InviteCodeRepository {
  readonly rows = new Map<string, InviteCode>();

  async create(invite: InviteCode): Promise<void> {
    if (this.rows.has(invite.code)) {
      throw new Error(`Invite code ${invite.code} already exists`);
    }
    this.rows.set(invite.code, { ...invite });
  }

  async listPending(scope: ScopeFilter): Promise<InviteCode[]> {
    return [...this.rows.values()]
      .filter((invite) => invite.usedBy === null && inScope(scope, invite.companyId))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }
}

export class InMemoryUserRepository implements UserRepository {
  readonly rows = new Map<string, User>();

  constructor(private invites: InMemoryInviteCodeRepository) {}

  async findById(userId: string): Promise<User | null> {
    return this.rows.get(userId) ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const wanted = email.toLowerCase();
    return [...this.rows.values()].find((user) => user.email === wanted) ?? null;
  }

  async list(scope: ScopeFilter): Promise<User[]> {
    return [...this.rows.values()]
      .filter((user) => inScope(scope, user.companyId))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  async countByCompany(companyId: string): Promise<number> {
    return [...this.rows.values()].filter((user) => user.companyId === companyId).length;
  }

  async createFirstUser(user: User): Promise<boolean> {
    if (this.rows.size > 0) {
      return false;
    }
    this.rows.set(user.id, { ...user });
    return true;
  }

  async createWithInvite(input: InvitedUserInput, inviteCode: string): Promise<User> {
    const invite = this.invites.rows.get(inviteCode);
    if (!invite || invite.usedBy !== null) {
      throw new NotFoundError(INVALID_INVITE_MESSAGE);
    }
    if (await this.findByEmail(input.email)) {
      throw new ValidationError(EMAIL_TAKEN_MESSAGE);
    }

    const user: User = {
      ...input,
      email: input.email.toLowerCase(),
      role: invite.role,
      companyId: invite.companyId,
    };
    this.rows.set(user.id, user);
    this.invites.rows.set(inviteCode, { ...invite, usedBy: user.id, usedAt: input.createdAt });
    return user;
  }

  async updatePasswordHash(userId: string, passwordHash: string): Promise<void> {
    const user = this.rows.get(userId);
    if (user) {
      this.rows.set(userId, { ...user, passwordHash });
    }
  }

  async delete(userId: string): Promise<void> {
    this.rows.delete(userId);
  }
}

export class InMemorySessionRepository implements SessionRepository {
  readonly rows = new Map<string, Session>();

  async create(session: Session): Promise<void> {
    this.rows.set(session.token, { ...session });
  }

  async find(token: string): Promise<Session | null> {
    return this.rows.get(token) ?? null;
  }

  async delete(token: string): Promise<void> {
    this.rows.delete(token);
  }

  async deleteForUser(userId: string): Promise<number> {
    let deleted = 0;
    for (const [token, session] of this.rows) {
      if (session.userId === userId) {
        this.rows.delete(token);
        deleted += 1;
      }
    }
    return deleted;
  }
}

export class InMemoryCompanyRepository implements CompanyRepository {
  readonly rows = new Map<string, Company>();

  constructor(
    private users: InMemoryUserRepository,
    private expenses: InMemoryExpenseRepository,
    private invites: InMemoryInviteCodeRepository
  ) {}

  async findById(companyId: string): Promise<Company | null> {
    const company = this.rows.get(companyId);
    return company ? { ...company } : null;
  }

  async list(): Promise<Company[]> {
    return [...this.rows.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  async create(company: Company): Promise<void> {
    this.rows.set(company.id, { ...company });
  }

  async update(companyId: string, changes: CompanyChanges): Promise<void> {
    const company = this.rows.get(companyId);
    if (!company) {
      throw new Error(`No company ${companyId}`);
    }
    this.rows.set(companyId, { ...company, ...changes });
  }

  async deleteCascade(companyId: string): Promise<CompanyDeletionResult> {
    const result: CompanyDeletionResult = { users: 0, expenses: 0, inviteCodes: 0, receiptImages: [] };

    for (const [id, expense] of this.expenses.rows) {
      if (expense.companyId === companyId) {
        this.expenses.rows.delete(id);
        result.expenses += 1;
        if (expense.receiptImage) {
          result.receiptImages.push(expense.receiptImage);
        }
      }
    }
    for (const [id, user] of this.users.rows) {
      if (user.companyId === companyId) {
        this.users.rows.delete(id);
        result.users += 1;
      }
    }
    for (const [code, invite] of this.invites.rows) {
      if (invite.companyId === companyId && invite.usedBy === null) {
        this.invites.rows.delete(code);
        result.inviteCodes += 1;
      }
    }
    this.rows.delete(companyId);
    return result;
  }
}

export interface InMemoryRepositories extends Repositories {
  companies: InMemoryCompanyRepository;
  users: InMemoryUserRepository;
  inviteCodes: InMemoryInviteCodeRepository;
  sessions: InMemorySessionRepository;
  expenses: InMemoryExpenseRepository;
}

export function createInMemoryRepositories(): InMemoryRepositories {
  const inviteCodes = new InMemoryInviteCodeRepository();
  const users = new InMemoryUserRepository(inviteCodes);
  const expenses = new InMemoryExpenseRepository();
  const sessions = new InMemorySessionRepository();
  const companies = new InMemoryCompanyRepository(users, expenses, inviteCodes);
  return { companies, users, inviteCodes, sessions, expenses };
}
