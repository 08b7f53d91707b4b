/**
 * Upload extension to media type mapping
 */

import type { UploadMediaType } from '../../../../../shared/types';

export const EXTENSION_MEDIA_TYPES: Readonly<Record<string, UploadMediaType>> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.webp': 'image/webp',
  '.gif': 'image/gif',
  '.heic': 'image/heic',
  '.heif': 'image/heic',
  '.pdf': 'application/pdf',
};

/**
 * Normalize "PDF", "pdf" or ".Pdf" to ".pdf"
 */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  if (!trimmed) {
    return '';
  }
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

/**
 * Unrecognized extensions are read as JPEG
 */
export function mediaTypeForExtension(extension: string): UploadMediaType {
  return EXTENSION_MEDIA_TYPES[normalizeExtension(extension)] ?? 'image/jpeg';
}

/**
 * Extension part of an uploaded file name ("scan.final.PDF" -> ".pdf")
 */
export function extensionOf(fileName: string): string {
  const lastDot = fileName.lastIndexOf('.');
  if (lastDot <= 0 || lastDot === fileName.length - 1) {
    return '';
  }
  return normalizeExtension(fileName.slice(lastDot));
}
