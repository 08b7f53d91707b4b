/**
 * Receipt Processing Types
 * Normalized page images and the structured record returned by the extractor
 */

import type { ExpenseCategory } from './expense.types';

export type ImageMediaType = 'image/jpeg' | 'image/png' | 'image/webp' | 'image/gif' | 'image/heic';
export type UploadMediaType = ImageMediaType | 'application/pdf';

/**
 * One page image ready for extraction
 */
export interface NormalizedImage {
  data: Buffer;
  mediaType: Exclude<ImageMediaType, 'image/heic'>;
}

export interface NormalizedDocument {
  pages: NormalizedImage[]; // input page order, never empty
  preview: NormalizedImage & { extension: string };
}

export interface ReceiptExtraction {
  date: string;
  vendor: string;
  location: string;
  category: ExpenseCategory;
  subtotal: number;
  tax: number;
  tip: number;
  total: number;
  paymentMethod: string;
  currency: string;
  items: string;
}
