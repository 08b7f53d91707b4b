/**
 * Test data builders
 */

import type {
  Company,
  Expense,
  Identity,
  NormalizedDocument,
  ReceiptExtraction,
} from '../../../../shared/types';
import { CurrencyService, type FetchFn } from '../../src/services/currency/currency.service';
import type { ReceiptExtractor } from '../../src/services/llms/receipt-extraction.service';
import type {
  ReceiptImageStore,
  StoredImageContext,
} from '../../src/services/storage/receipt-image.store';

export const COMPANY_A = 'company-a';
export const COMPANY_B = 'company-b';

export function superAdmin(overrides: Partial<Identity> = {}): Identity {
  return {
    userId: 'user-root',
    name: 'Root Admin',
    email: 'root@example.com',
    role: 'super_admin',
    companyId: null,
    companyName: 'All Companies',
    ...overrides,
  };
}

export function companyAdmin(companyId = COMPANY_A, overrides: Partial<Identity> = {}): Identity {
  return {
    userId: `admin-${companyId}`,
    name: `Admin ${companyId}`,
    email: `admin@${companyId}.example.com`,
    role: 'company_admin',
    companyId,
    companyName: `Company ${companyId}`,
    ...overrides,
  };
}

export function member(companyId = COMPANY_A, overrides: Partial<Identity> = {}): Identity {
  return {
    userId: `member-${companyId}`,
    name: `Member ${companyId}`,
    email: `member@${companyId}.example.com`,
    role: 'member',
    companyId,
    companyName: `Company ${companyId}`,
    ...overrides,
  };
}

export function makeCompany(overrides: Partial<Company> = {}): Company {
  return {
    id: COMPANY_A,
    name: 'Company A',
    homeCurrency: 'USD',
    createdAt: new Date('2024-01-01T00:00:00.000Z'),
    ...overrides,
  };
}

export function makeExtraction(overrides: Partial<ReceiptExtraction> = {}): ReceiptExtraction {
  return {
    date: '2024-03-15',
    vendor: 'Corner Cafe',
    location: 'Lyon, France',
    category: 'Food & Dining',
    subtotal: 11.4,
    tax: 1.1,
    tip: 0,
    total: 12.5,
    paymentMethod: 'Visa ****1234',
    currency: 'EUR',
    items: 'Cappuccino (4.50), Croissant (6.90)',
    ...overrides,
  };
}

let expenseCounter = 0;

export function makeExpense(overrides: Partial<Expense> = {}): Expense {
  expenseCounter += 1;
  return {
    id: `expense-${expenseCounter}`,
    date: '2024-03-15',
    vendor: 'Corner Cafe',
    location: 'Lyon, France',
    category: 'Food & Dining',
    subtotal: 10,
    tax: 0,
    tip: 0,
    total: 10,
    paymentMethod: 'Cash',
    currency: 'USD',
    totalHome: 10,
    totalUsd: 10,
    items: '',
    uploadedBy: 'Member company-a',
    uploadedById: 'member-company-a',
    companyId: COMPANY_A,
    receiptImage: '',
    createdAt: new Date('2024-03-15T12:00:00.000Z'),
    ...overrides,
  };
}

/**
 * Image store that records saves and deletes in memory
 */
export class FakeImageStore implements ReceiptImageStore {
  readonly stored = new Map<string, NormalizedDocument['preview']>();
  readonly deleted: string[] = [];

  save = jest.fn(
    async (image: NormalizedDocument['preview'], context: StoredImageContext): Promise<string> => {
      const reference = `${context.companyId ?? 'unassigned'}/${context.expenseId}${image.extension}`;
      this.stored.set(reference, image);
      return reference;
    }
  );

  delete = jest.fn(async (reference: string): Promise<void> => {
    this.stored.delete(reference);
    this.deleted.push(reference);
  });
}

export function fakeExtractor(extraction: ReceiptExtraction = makeExtraction()) {
  const extractReceipt = jest.fn<
    ReturnType<ReceiptExtractor['extractReceipt']>,
    Parameters<ReceiptExtractor['extractReceipt']>
  >();
  extractReceipt.mockResolvedValue(extraction);
  const extractor: ReceiptExtractor = { extractReceipt };
  return { extractor, extractReceipt };
}

/**
 * Currency service whose rate source is unreachable, so it serves the fallback table
 */
export function offlineCurrencyService() {
  const fetch = jest.fn<ReturnType<FetchFn>, Parameters<FetchFn>>();
  fetch.mockRejectedValue(new Error('network unreachable'));
  const currency = new CurrencyService({
    sourceUrl: 'https://rates.test/latest',
    cacheTtlMs: 60 * 60 * 1000,
    retryBackoffMs: 60 * 1000,
    timeoutMs: 5000,
    fetch,
  });
  return { currency, fetch };
}
