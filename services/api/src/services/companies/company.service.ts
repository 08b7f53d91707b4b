/**
 * Company management
 * Tenant lifecycle (super admin) and per-company settings (company admins)
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type {
  Company,
  CompanySummary,
  Identity,
  InviteCode,
  RecalculationResult,
} from '../../../../../shared/types';
import { NotFoundError, ValidationError } from '../../errors';
import logger from '../../logger';
import type {
  CompanyChanges,
  CompanyRepository,
  ExpenseRepository,
  InviteCodeRepository,
  UserRepository,
} from '../../repositories';
import { requireAccess } from '../access/access-policy.service';
import { roundCurrency } from '../currency/currency-code';
import type { RecalculationService } from '../currency/recalculation.service';
import { discardImage, type ReceiptImageStore } from '../storage/receipt-image.store';
import { generateInviteCode } from '../team/invite-code';

export interface CreatedCompany {
  company: Company;
  adminInviteCode: string;
}

export interface CompanyDeletion {
  companyId: string;
  users: number;
  expenses: number;
  inviteCodes: number;
}

export interface CompanySettingsUpdate {
  company: Company;
  recalculation: RecalculationResult | null;
}

const CurrencyCodeSchema = z
  .string()
  .trim()
  .toUpperCase()
  .regex(/^[A-Z]{3}$/, 'Currency must be a 3-letter code');

const CreateCompanySchema = z.object({
  name: z.string().trim().default(''),
  homeCurrency: CurrencyCodeSchema.default('USD'),
});

const CompanySettingsSchema = z.object({
  name: z.string().trim().min(1, 'Company name required').optional(),
  homeCurrency: CurrencyCodeSchema.optional(),
});

export class CompanyService {
  constructor(
    private companies: CompanyRepository,
    private users: UserRepository,
    private expenses: ExpenseRepository,
    private inviteCodes: InviteCodeRepository,
    private images: ReceiptImageStore,
    private recalculation: RecalculationService,
    private now: () => Date = () => new Date()
  ) {}

  async listCompanies(identity: Identity): Promise<CompanySummary[]> {
    requireAccess(identity, 'company:manage');
    const companies = await this.companies.list();

    return Promise.all(
      companies.map(async (company) => {
        const [userCount, stats] = await Promise.all([
          this.users.countByCompany(company.id),
          this.expenses.statsByCompany(company.id),
        ]);
        return {
          ...company,
          userCount,
          expenseCount: stats.count,
          totalSpentUsd: roundCurrency(stats.totalUsd),
        };
      })
    );
  }

  /**
   * Create a tenant together with the single-use invite for its first admin
   */
  async createCompany(identity: Identity, input: unknown): Promise<CreatedCompany> {
    requireAccess(identity, 'company:manage');
    const { name, homeCurrency } = CreateCompanySchema.parse(input ?? {});
    if (!name) {
      throw new ValidationError('Company name required');
    }

    const createdAt = this.now();
    const company: Company = { id: randomUUID(), name, homeCurrency, createdAt };
    await this.companies.create(company);

    const invite: InviteCode = {
      code: generateInviteCode(),
      companyId: company.id,
      role: 'company_admin',
      createdBy: identity.userId,
      usedBy: null,
      usedAt: null,
      createdAt,
    };
    await this.inviteCodes.create(invite);

    logger.info({ companyId: company.id, homeCurrency, createdBy: identity.userId }, 'Company created');
    return { company, adminInviteCode: invite.code };
  }

  async deleteCompany(identity: Identity, companyId: string): Promise<CompanyDeletion> {
    requireAccess(identity, 'company:manage');
    if (!(await this.companies.findById(companyId))) {
      throw new NotFoundError('Company not found');
    }

    const { receiptImages, ...counts } = await this.companies.deleteCascade(companyId);
    await Promise.all(receiptImages.map((reference) => discardImage(this.images, reference)));

    logger.info({ companyId, ...counts, deletedBy: identity.userId }, 'Company deleted');
    return { companyId, ...counts };
  }

  /**
   * Rename a company or change its home currency. A currency change immediately
   * recalculates the company's converted totals.
   */
  async updateCompanySettings(
    identity: Identity,
    companyId: string | null | undefined,
    input: unknown
  ): Promise<CompanySettingsUpdate> {
    const scope = requireAccess(identity, 'company:settings', companyId);
    if (scope.kind === 'all') {
      throw new ValidationError('Select a company');
    }

    const company = await this.companies.findById(scope.companyId);
    if (!company) {
      throw new NotFoundError('Company not found');
    }

    const parsed = CompanySettingsSchema.parse(input ?? {});
    const changes: CompanyChanges = {};
    if (parsed.name !== undefined) {
      changes.name = parsed.name;
    }
    if (parsed.homeCurrency !== undefined) {
      changes.homeCurrency = parsed.homeCurrency;
    }
    if (Object.keys(changes).length === 0) {
      throw new ValidationError('No settings supplied');
    }

    await this.companies.update(company.id, changes);
    const updated: Company = { ...company, ...changes };
    logger.info({ companyId: company.id, fields: Object.keys(changes) }, 'Company settings updated');

    const currencyChanged = updated.homeCurrency !== company.homeCurrency;
    const recalculation = currencyChanged
      ? await this.recalculation.recalculateCompany(identity, company.id)
      : null;

    return { company: updated, recalculation };
  }
}
