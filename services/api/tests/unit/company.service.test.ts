/**
 * Company Management Tests
 */

import { CompanyService } from '../../src/services/companies/company.service';
import { RecalculationService } from '../../src/services/currency/recalculation.service';
import { AccessDeniedError, NotFoundError, ValidationError } from '../../src/errors';
import {
  createInMemoryRepositories,
  type InMemoryRepositories,
} from '../helpers/in-memory-repositories';
import {
  COMPANY_A,
  COMPANY_B,
  FakeImageStore,
  companyAdmin,
  makeCompany,
  makeExpense,
  member,
  offlineCurrencyService,
  superAdmin,
} from '../helpers/fixtures';

const NOW = new Date('2024-05-01T00:00:00.000Z');

describe('CompanyService', () => {
  let repositories: InMemoryRepositories;
  let images: FakeImageStore;
  let service: CompanyService;

  beforeEach(async () => {
    repositories = createInMemoryRepositories();
    images = new FakeImageStore();
    const { currency } = offlineCurrencyService();
    const recalculation = new RecalculationService(
      repositories.expenses,
      repositories.companies,
      currency
    );
    service = new CompanyService(
      repositories.companies,
      repositories.users,
      repositories.expenses,
      repositories.inviteCodes,
      images,
      recalculation,
      () => NOW
    );

    await repositories.companies.create(makeCompany({ id: COMPANY_A, name: 'Company A' }));
    await repositories.companies.create(makeCompany({ id: COMPANY_B, name: 'Company B' }));
    repositories.users.rows.set('member-company-a', {
      id: 'member-company-a',
      name: 'Member',
      email: 'member@a.example.com',
      passwordHash: 'scrypt$00$00',
      role: 'member',
      companyId: COMPANY_A,
      createdAt: NOW,
    });
    await repositories.expenses.create(
      makeExpense({ id: 'a-1', companyId: COMPANY_A, totalUsd: 10.1, receiptImage: 'company-a/a-1.jpg' })
    );
    await repositories.expenses.create(makeExpense({ id: 'a-2', companyId: COMPANY_A, totalUsd: 20 }));
    await repositories.expenses.create(makeExpense({ id: 'b-1', companyId: COMPANY_B, totalUsd: 5 }));
  });

  describe('listCompanies', () => {
    it('should summarize users, expenses and USD spend per company', async () => {
      const companies = await service.listCompanies(superAdmin());

      expect(companies.map(({ id, userCount, expenseCount, totalSpentUsd }) => ({
        id,
        userCount,
        expenseCount,
        totalSpentUsd,
      }))).toEqual([
        { id: COMPANY_A, userCount: 1, expenseCount: 2, totalSpentUsd: 30.1 },
        { id: COMPANY_B, userCount: 0, expenseCount: 1, totalSpentUsd: 5 },
      ]);
    });

    it('should be super admin only', async () => {
      await expect(service.listCompanies(companyAdmin())).rejects.toThrow(
        new AccessDeniedError('Super admin only')
      );
    });
  });

  describe('createCompany', () => {
    it('should create the company with a company admin invite', async () => {
      const { company, adminInviteCode } = await service.createCompany(superAdmin(), {
        name: '  Northwind  ',
        homeCurrency: 'eur',
      });

      expect(company).toMatchObject({ name: 'Northwind', homeCurrency: 'EUR', createdAt: NOW });
      expect(repositories.companies.rows.get(company.id)).toEqual(company);
      expect(repositories.inviteCodes.rows.get(adminInviteCode)).toMatchObject({
        companyId: company.id,
        role: 'company_admin',
        createdBy: 'user-root',
        usedBy: null,
      });
    });

    it('should default the home currency to USD', async () => {
      const { company } = await service.createCompany(superAdmin(), { name: 'Northwind' });

      expect(company.homeCurrency).toBe('USD');
    });

    it('should require a name', async () => {
      await expect(service.createCompany(superAdmin(), { name: '   ' })).rejects.toThrow(
        new ValidationError('Company name required')
      );
    });

    it('should deny company admins', async () => {
      await expect(service.createCompany(companyAdmin(), { name: 'Rogue' })).rejects.toThrow(
        AccessDeniedError
      );
    });
  });

  describe('deleteCompany', () => {
    it('should cascade to users, expenses, unused invites and stored images', async () => {
      const { adminInviteCode } = await service.createCompany(superAdmin(), { name: 'Spare' });
      await repositories.inviteCodes.create({
        code: 'INV-PENDINGA',
        companyId: COMPANY_A,
        role: 'member',
        createdBy: 'admin-company-a',
        usedBy: null,
        usedAt: null,
        createdAt: NOW,
      });

      const result = await service.deleteCompany(superAdmin(), COMPANY_A);

      expect(result).toEqual({ companyId: COMPANY_A, users: 1, expenses: 2, inviteCodes: 1 });
      expect(repositories.companies.rows.has(COMPANY_A)).toBe(false);
      expect([...repositories.expenses.rows.keys()]).toEqual(['b-1']);
      expect(repositories.inviteCodes.rows.has(adminInviteCode)).toBe(true);
      expect(images.deleted).toEqual(['company-a/a-1.jpg']);
    });

    it('should report an unknown company', async () => {
      await expect(service.deleteCompany(superAdmin(), 'company-x')).rejects.toThrow(
        new NotFoundError('Company not found')
      );
    });
  });

  describe('updateCompanySettings', () => {
    it('should rename without recalculating', async () => {
      const result = await service.updateCompanySettings(companyAdmin(), undefined, {
        name: 'Company A Ltd',
      });

      expect(result.company).toMatchObject({ id: COMPANY_A, name: 'Company A Ltd', homeCurrency: 'USD' });
      expect(result.recalculation).toBeNull();
    });

    it('should recalculate converted totals when the home currency changes', async () => {
      const result = await service.updateCompanySettings(companyAdmin(), undefined, {
        homeCurrency: 'gbp',
      });

      expect(result.company.homeCurrency).toBe('GBP');
      expect(result.recalculation).toEqual({ companyId: COMPANY_A, homeCurrency: 'GBP', updated: 2 });
      expect(repositories.expenses.rows.get('a-2')).toMatchObject({ totalHome: 7.9 });
    });

    it('should make the super admin choose a company', async () => {
      await expect(
        service.updateCompanySettings(superAdmin(), undefined, { name: 'Renamed' })
      ).rejects.toThrow(new ValidationError('Select a company'));
    });

    it('should reject an empty update', async () => {
      await expect(service.updateCompanySettings(companyAdmin(), undefined, {})).rejects.toThrow(
        new ValidationError('No settings supplied')
      );
    });

    it('should deny members', async () => {
      await expect(
        service.updateCompanySettings(member(), undefined, { name: 'Renamed' })
      ).rejects.toThrow(AccessDeniedError);
    });
  });
});
