/**
 * Expense Ledger
 * Tenant-scoped persistence and queries for expense records. Every read resolves the
 * caller's scope through the access policy before touching the repository.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  EDITABLE_EXPENSE_FIELDS,
  REFERENCE_CURRENCY,
  type DashboardSummary,
  type Expense,
  type ExpensePatch,
  type Identity,
  type ReceiptExtraction,
} from '../../../../../shared/types';
import { AccessDeniedError, NotFoundError, ValidationError } from '../../errors';
import logger from '../../logger';
import type { CompanyRepository, ExpenseRepository } from '../../repositories';
import {
  requireAccess,
  requireRecordAccess,
  type ScopeFilter,
} from '../access/access-policy.service';
import { normalizeCurrencyCode } from '../currency/currency-code';
import { buildExpenseWorkbook, exportFileName } from '../export/excel-export.service';
import { discardImage, type ReceiptImageStore } from '../storage/receipt-image.store';
import { normalizeCategory } from './categories';
import { computeDashboard } from './dashboard-metrics';

export interface ScopeOptions {
  companyId?: string | null;
}

export interface NewExpense {
  extraction: ReceiptExtraction;
  totalHome: number;
  totalUsd: number;
  companyId: string | null;
  uploader: Identity;
  receiptImage: string;
  id?: string;
}

export interface WorkbookExport {
  fileName: string;
  buffer: Buffer;
}

const amount = z.number().finite().nonnegative();

/**
 * Allow-listed edit fields; unknown keys are stripped, converted totals are not editable
 */
export const ExpensePatchSchema = z
  .object({
    date: z.string(),
    vendor: z.string(),
    location: z.string(),
    category: z.string().transform(normalizeCategory),
    subtotal: amount,
    tax: amount,
    tip: amount,
    total: amount,
    paymentMethod: z.string(),
    currency: z.string().transform((code) => normalizeCurrencyCode(code)),
    items: z.string(),
  })
  .partial();

export class ExpenseService {
  constructor(
    private expenses: ExpenseRepository,
    private companies: CompanyRepository,
    private images: ReceiptImageStore
  ) {}

  /**
   * Persist a freshly ingested expense
   */
  async create(input: NewExpense): Promise<Expense> {
    const expense: Expense = {
      id: input.id ?? randomUUID(),
      ...input.extraction,
      totalHome: input.totalHome,
      totalUsd: input.totalUsd,
      uploadedBy: input.uploader.name,
      uploadedById: input.uploader.userId,
      companyId: input.companyId,
      receiptImage: input.receiptImage,
      createdAt: new Date(),
    };
    await this.expenses.create(expense);
    return expense;
  }

  async list(identity: Identity, options: ScopeOptions = {}): Promise<Expense[]> {
    const scope = requireAccess(identity, 'expense:read', options.companyId);
    return this.expenses.list(scope);
  }

  async get(identity: Identity, expenseId: string): Promise<Expense> {
    const expense = await this.expenses.findById(expenseId);
    if (!expense) {
      throw new NotFoundError('Expense not found');
    }
    requireRecordAccess(identity, 'expense:read', expense.companyId);
    return expense;
  }

  async update(identity: Identity, expenseId: string, changes: unknown): Promise<Expense> {
    const patch = this.parsePatch(changes);
    const expense = await this.get(identity, expenseId);
    requireRecordAccess(identity, 'expense:write', expense.companyId);

    await this.expenses.update(expenseId, patch);
    logger.info(
      { expenseId, userId: identity.userId, fields: Object.keys(patch) },
      'Expense updated'
    );
    return { ...expense, ...patch };
  }

  async delete(identity: Identity, expenseId: string): Promise<void> {
    requireAccess(identity, 'expense:delete');
    const expense = await this.expenses.findById(expenseId);

    if (identity.role === 'super_admin') {
      if (!expense) {
        throw new NotFoundError('Expense not found');
      }
    } else if (!expense || expense.companyId !== identity.companyId) {
      // Missing and foreign look the same to tenant users
      throw new AccessDeniedError();
    }

    await this.expenses.delete(expense.id);
    if (expense.receiptImage) {
      await discardImage(this.images, expense.receiptImage);
    }
    logger.info({ expenseId, userId: identity.userId }, 'Expense deleted');
  }

  async dashboard(identity: Identity, options: ScopeOptions = {}): Promise<DashboardSummary> {
    const scope = requireAccess(identity, 'expense:read', options.companyId);
    const expenses = await this.expenses.list(scope);

    if (scope.kind === 'all') {
      return computeDashboard(expenses, 'totalUsd', REFERENCE_CURRENCY);
    }
    const company = await this.companies.findById(scope.companyId);
    return computeDashboard(expenses, 'totalHome', company?.homeCurrency ?? REFERENCE_CURRENCY);
  }

  async exportWorkbook(identity: Identity, options: ScopeOptions = {}): Promise<WorkbookExport> {
    const scope = requireAccess(identity, 'expense:read', options.companyId);
    const expenses = await this.expenses.list(scope);
    if (expenses.length === 0) {
      throw new ValidationError('No expenses to export');
    }

    const ascending = [...expenses].sort((a, b) => a.date.localeCompare(b.date));
    const title = await this.exportTitle(identity, scope);
    return { fileName: exportFileName(), buffer: await buildExpenseWorkbook(ascending, title) };
  }

  private async exportTitle(identity: Identity, scope: ScopeFilter): Promise<string> {
    if (scope.kind === 'all') {
      return 'All Companies';
    }
    if (scope.companyId === identity.companyId) {
      return identity.companyName;
    }
    const company = await this.companies.findById(scope.companyId);
    return company?.name ?? '';
  }

  private parsePatch(changes: unknown): ExpensePatch {
    const patch: ExpensePatch = ExpensePatchSchema.parse(changes);
    if (!EDITABLE_EXPENSE_FIELDS.some((field) => patch[field] !== undefined)) {
      throw new ValidationError('No editable fields supplied');
    }
    return patch;
  }
}
