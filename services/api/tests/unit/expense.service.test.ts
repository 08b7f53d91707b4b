/**
 * Expense Ledger Tests
 * Tenant scoping, edit allow-list, deletion rules, dashboard and export
 */

import { Readable } from 'node:stream';
import { Workbook } from 'exceljs';
import { ZodError } from 'zod';
import { ExpenseService } from '../../src/services/expenses/expense.service';
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
  makeExtraction,
  member,
  superAdmin,
} from '../helpers/fixtures';

describe('ExpenseService', () => {
  let repositories: InMemoryRepositories;
  let images: FakeImageStore;
  let service: ExpenseService;

  const ownMarch = makeExpense({
    id: 'a-march',
    date: '2024-03-10',
    companyId: COMPANY_A,
    receiptImage: 'company-a/a-march.jpg',
    total: 40,
    totalHome: 36.8,
    totalUsd: 40,
  });
  const ownApril = makeExpense({
    id: 'a-april',
    date: '2024-04-02',
    companyId: COMPANY_A,
    total: 20,
    totalHome: 18.4,
    totalUsd: 20,
  });
  const foreign = makeExpense({ id: 'b-one', date: '2024-03-12', companyId: COMPANY_B, totalUsd: 5 });
  const legacy = makeExpense({ id: 'legacy', date: '2023-12-31', companyId: null, totalUsd: 7 });

  beforeEach(async () => {
    repositories = createInMemoryRepositories();
    images = new FakeImageStore();
    service = new ExpenseService(repositories.expenses, repositories.companies, images);

    await repositories.companies.create(makeCompany({ id: COMPANY_A, name: 'Company A', homeCurrency: 'EUR' }));
    await repositories.companies.create(makeCompany({ id: COMPANY_B, name: 'Company B', homeCurrency: 'GBP' }));
    for (const expense of [ownMarch, ownApril, foreign, legacy]) {
      await repositories.expenses.create(expense);
    }
  });

  describe('create', () => {
    it('should store the extraction with totals and uploader details', async () => {
      const expense = await service.create({
        id: 'new-expense',
        extraction: makeExtraction(),
        totalHome: 13.59,
        totalUsd: 13.59,
        companyId: COMPANY_A,
        uploader: member(),
        receiptImage: 'company-a/new-expense.jpg',
      });

      expect(expense).toMatchObject({
        id: 'new-expense',
        vendor: 'Corner Cafe',
        currency: 'EUR',
        total: 12.5,
        totalHome: 13.59,
        totalUsd: 13.59,
        uploadedBy: 'Member company-a',
        uploadedById: 'member-company-a',
        companyId: COMPANY_A,
      });
      expect(repositories.expenses.rows.get('new-expense')).toEqual(expense);
    });
  });

  describe('list', () => {
    it('should return only the caller company rows, newest first', async () => {
      const expenses = await service.list(member());

      expect(expenses.map((expense) => expense.id)).toEqual(['a-april', 'a-march']);
    });

    it('should return every row to the super admin', async () => {
      const expenses = await service.list(superAdmin());

      expect(expenses.map((expense) => expense.id)).toEqual([
        'a-april',
        'b-one',
        'a-march',
        'legacy',
      ]);
    });

    it('should narrow the super admin view to a requested company', async () => {
      const expenses = await service.list(superAdmin(), { companyId: COMPANY_B });

      expect(expenses.map((expense) => expense.id)).toEqual(['b-one']);
    });

    it('should reject a tenant asking for another company', async () => {
      await expect(service.list(member(), { companyId: COMPANY_B })).rejects.toThrow(
        AccessDeniedError
      );
    });
  });

  describe('get', () => {
    it('should return an own-company expense', async () => {
      await expect(service.get(member(), 'a-march')).resolves.toMatchObject({ id: 'a-march' });
    });

    it('should deny a foreign expense', async () => {
      await expect(service.get(member(), 'b-one')).rejects.toThrow(AccessDeniedError);
    });

    it('should keep unassigned rows visible to the super admin only', async () => {
      await expect(service.get(companyAdmin(), 'legacy')).rejects.toThrow(AccessDeniedError);
      await expect(service.get(superAdmin(), 'legacy')).resolves.toMatchObject({ id: 'legacy' });
    });

    it('should report a missing expense', async () => {
      await expect(service.get(member(), 'missing')).rejects.toThrow(
        new NotFoundError('Expense not found')
      );
    });
  });

  describe('update', () => {
    it('should apply allow-listed fields and ignore converted totals', async () => {
      const updated = await service.update(member(), 'a-march', {
        vendor: 'Fuel Stop',
        category: 'fuel & parking',
        currency: 'gbp',
        totalUsd: 999,
        companyId: COMPANY_B,
      });

      expect(updated).toMatchObject({
        id: 'a-march',
        vendor: 'Fuel Stop',
        category: 'Fuel & Parking',
        currency: 'GBP',
        totalUsd: 40,
        companyId: COMPANY_A,
      });
      expect(repositories.expenses.rows.get('a-march')).toEqual(updated);
    });

    it('should reject a patch without editable fields', async () => {
      await expect(service.update(member(), 'a-march', { totalHome: 1 })).rejects.toThrow(
        new ValidationError('No editable fields supplied')
      );
    });

    it('should reject negative amounts', async () => {
      await expect(service.update(member(), 'a-march', { total: -5 })).rejects.toThrow(ZodError);
    });

    it('should not edit another company expense', async () => {
      await expect(service.update(companyAdmin(), 'b-one', { vendor: 'Hijacked' })).rejects.toThrow(
        AccessDeniedError
      );
      expect(repositories.expenses.rows.get('b-one')?.vendor).toBe('Corner Cafe');
    });
  });

  describe('delete', () => {
    it('should remove the row and its stored image', async () => {
      await service.delete(companyAdmin(), 'a-march');

      expect(repositories.expenses.rows.has('a-march')).toBe(false);
      expect(images.delete).toHaveBeenCalledWith('company-a/a-march.jpg');
    });

    it('should not touch storage for rows without an image', async () => {
      await service.delete(companyAdmin(), 'a-april');

      expect(images.delete).not.toHaveBeenCalled();
    });

    it('should deny members', async () => {
      await expect(service.delete(member(), 'a-march')).rejects.toThrow(
        new AccessDeniedError('Admin access required')
      );
      expect(repositories.expenses.rows.has('a-march')).toBe(true);
    });

    it('should answer AccessDenied for foreign and missing rows alike', async () => {
      await expect(service.delete(companyAdmin(), 'b-one')).rejects.toThrow(AccessDeniedError);
      await expect(service.delete(companyAdmin(), 'missing')).rejects.toThrow(AccessDeniedError);
      expect(repositories.expenses.rows.has('b-one')).toBe(true);
    });

    it('should report a missing row to the super admin', async () => {
      await expect(service.delete(superAdmin(), 'missing')).rejects.toThrow(NotFoundError);
    });

    it('should still delete the row when image removal fails', async () => {
      images.delete.mockRejectedValueOnce(new Error('bucket unavailable'));

      await expect(service.delete(companyAdmin(), 'a-march')).resolves.toBeUndefined();
      expect(repositories.expenses.rows.has('a-march')).toBe(false);
    });
  });

  describe('dashboard', () => {
    it('should sum home-currency totals for a company', async () => {
      const summary = await service.dashboard(member());

      expect(summary.currency).toBe('EUR');
      expect(summary.total).toBe(55.2);
      expect(summary.count).toBe(2);
      expect(summary.byMonth).toEqual({ '2024-03': 36.8, '2024-04': 18.4 });
    });

    it('should sum USD totals across every company for the super admin', async () => {
      const summary = await service.dashboard(superAdmin());

      expect(summary.currency).toBe('USD');
      expect(summary.total).toBe(72);
      expect(summary.count).toBe(4);
    });
  });

  describe('exportWorkbook', () => {
    async function titleAndDates(buffer: Buffer): Promise<{ title: unknown; dates: unknown[] }> {
      const workbook = new Workbook();
      await workbook.xlsx.read(Readable.from([buffer]));
      const sheet = workbook.getWorksheet('Expenses');
      return {
        title: sheet?.getCell('A1').value,
        dates: [5, 6].map((row) => sheet?.getRow(row).getCell(1).value),
      };
    }

    it('should export the caller company in ascending date order', async () => {
      const { fileName, buffer } = await service.exportWorkbook(member());

      expect(fileName).toMatch(/^expenses_\d{4}-\d{2}-\d{2}\.xlsx$/);
      await expect(titleAndDates(buffer)).resolves.toEqual({
        title: 'Company company-a',
        dates: ['2024-03-10', '2024-04-02'],
      });
    });

    it('should title a super admin export by the requested company name', async () => {
      const { buffer } = await service.exportWorkbook(superAdmin(), { companyId: COMPANY_B });

      await expect(titleAndDates(buffer)).resolves.toMatchObject({ title: 'Company B' });
    });

    it('should refuse to export nothing', async () => {
      repositories.expenses.rows.clear();

      await expect(service.exportWorkbook(member())).rejects.toThrow(
        new ValidationError('No expenses to export')
      );
    });
  });
});
