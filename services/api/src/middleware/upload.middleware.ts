/**
 * Multipart receipt upload, kept in memory for the ingestion pipeline
 */

import multer from 'multer';

export const RECEIPT_FIELD = 'receipt';

export function createReceiptUpload(maxUploadBytes: number) {
  return multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes, files: 1 },
  }).single(RECEIPT_FIELD);
}
