/**
 * Receipt image storage on Cloud Storage
 * Path format: {companyId | unassigned}/{expenseId}{extension}
 * The stored reference is the object path inside the receipts bucket.
 */

import type { Storage } from '@google-cloud/storage';
import type { NormalizedDocument } from '../../../../../shared/types';
import { errorMessage } from '../../errors';
import logger from '../../logger';

export interface StoredImageContext {
  expenseId: string;
  companyId: string | null;
  uploadedById: string;
}

export interface ReceiptImageStore {
  /** Persist the preview image and return its reference */
  save(image: NormalizedDocument['preview'], context: StoredImageContext): Promise<string>;
  delete(reference: string): Promise<void>;
}

/**
 * Best-effort removal; a failure is logged and never propagated
 */
export async function discardImage(store: ReceiptImageStore, reference: string): Promise<boolean> {
  try {
    await store.delete(reference);
    return true;
  } catch (error) {
    logger.warn(
      { reference, error: errorMessage(error) },
      'Failed to delete stored receipt image'
    );
    return false;
  }
}

export class GcsReceiptImageStore implements ReceiptImageStore {
  constructor(
    private storage: Storage,
    private bucketName: string
  ) {}

  async save(image: NormalizedDocument['preview'], context: StoredImageContext): Promise<string> {
    const filePath = `${context.companyId ?? 'unassigned'}/${context.expenseId}${image.extension}`;
    const file = this.storage.bucket(this.bucketName).file(filePath);

    await file.save(image.data, {
      contentType: image.mediaType,
      resumable: false,
      metadata: {
        metadata: {
          expenseId: context.expenseId,
          uploadedById: context.uploadedById,
          storedAt: new Date().toISOString(),
        },
      },
    });

    logger.debug({ bucket: this.bucketName, filePath }, 'Stored receipt image');
    return filePath;
  }

  async delete(reference: string): Promise<void> {
    await this.storage.bucket(this.bucketName).file(reference).delete({ ignoreNotFound: true });
  }
}
