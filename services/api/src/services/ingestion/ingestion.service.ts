/**
 * Receipt Ingestion Pipeline
 * access → validate → normalize → extract → convert → store image → persist.
 * Any failing stage aborts before the database write; when the write itself fails
 * the stored image is removed again, so no partial record is ever left behind.
 */

import { randomUUID } from 'node:crypto';
import { REFERENCE_CURRENCY, type Expense, type Identity } from '../../../../../shared/types';
import { NotFoundError, ValidationError, errorMessage } from '../../errors';
import logger from '../../logger';
import type { CompanyRepository } from '../../repositories';
import { requireAccess } from '../access/access-policy.service';
import type { CurrencyService } from '../currency/currency.service';
import { normalizeDocument } from '../documents/document-normalizer.service';
import { extensionOf } from '../documents/media-types';
import type { ExpenseService } from '../expenses/expense.service';
import type { ReceiptExtractor } from '../llms/receipt-extraction.service';
import { discardImage, type ReceiptImageStore } from '../storage/receipt-image.store';

export interface ReceiptUpload {
  fileName: string;
  bytes: Buffer;
  companyId?: string | null;
}

interface IngestionTarget {
  companyId: string | null;
  homeCurrency: string;
}

export class IngestionService {
  constructor(
    private extractor: ReceiptExtractor,
    private currency: CurrencyService,
    private ledger: ExpenseService,
    private companies: CompanyRepository,
    private images: ReceiptImageStore
  ) {}

  async ingestReceipt(identity: Identity, upload: ReceiptUpload): Promise<Expense> {
    const scope = requireAccess(identity, 'expense:write', upload.companyId);

    if (!upload.fileName.trim()) {
      throw new ValidationError('No file uploaded');
    }
    if (upload.bytes.length === 0) {
      throw new ValidationError('Uploaded file is empty');
    }

    const target = await this.resolveTarget(scope.kind === 'company' ? scope.companyId : null);
    const expenseId = randomUUID();
    const log = logger.child({
      expenseId,
      userId: identity.userId,
      companyId: target.companyId,
      fileName: upload.fileName,
    });
    log.info({ bytes: upload.bytes.length }, 'Ingesting receipt');

    const document = await normalizeDocument(upload.bytes, extensionOf(upload.fileName));
    const extraction = await this.extractor.extractReceipt(document.pages);
    const { totalHome, totalUsd } = await this.currency.convertTotals(
      extraction.total,
      extraction.currency,
      target.homeCurrency
    );

    const receiptImage = await this.images.save(document.preview, {
      expenseId,
      companyId: target.companyId,
      uploadedById: identity.userId,
    });

    try {
      const expense = await this.ledger.create({
        id: expenseId,
        extraction,
        totalHome,
        totalUsd,
        companyId: target.companyId,
        uploader: identity,
        receiptImage,
      });
      log.info(
        { vendor: expense.vendor, total: expense.total, currency: expense.currency },
        'Receipt ingested'
      );
      return expense;
    } catch (error) {
      log.error({ error: errorMessage(error) }, 'Failed to persist expense, removing stored image');
      await discardImage(this.images, receiptImage);
      throw error;
    }
  }

  private async resolveTarget(companyId: string | null): Promise<IngestionTarget> {
    // Super admin uploads without a company filter stay unassigned
    if (!companyId) {
      return { companyId: null, homeCurrency: REFERENCE_CURRENCY };
    }
    const company = await this.companies.findById(companyId);
    if (!company) {
      throw new NotFoundError('Company not found');
    }
    return { companyId: company.id, homeCurrency: company.homeCurrency };
  }
}
