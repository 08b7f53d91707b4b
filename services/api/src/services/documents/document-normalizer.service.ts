/**
 * Document Normalizer
 * Turns arbitrary uploaded bytes (JPEG/PNG/WebP/GIF/HEIC/PDF) into the ordered page
 * images sent to extraction, plus the image kept as the stored receipt preview.
 */

import sharp from 'sharp';
import type { NormalizedDocument, NormalizedImage } from '../../../../../shared/types';
import {
  ConversionFailedError,
  DocumentUnreadableError,
  ValidationError,
  errorMessage,
} from '../../errors';
import logger from '../../logger';
import { heicToJpeg } from './heic.service';
import { mediaTypeForExtension } from './media-types';
import { renderPdfPages } from './pdf-renderer.service';

export const HEIC_JPEG_QUALITY = 85;
export const COMPRESSION_THRESHOLD_BYTES = 1.5 * 1024 * 1024;
export const COMPRESSION_MAX_DIMENSION = 2000;
export const COMPRESSION_JPEG_QUALITY = 80;
export const PDF_MAX_PAGES = 10;
export const PDF_RENDER_DPI = 200;

const PREVIEW_EXTENSIONS: Record<NormalizedImage['mediaType'], string> = {
  'image/jpeg': '.jpg',
  'image/png': '.png',
  'image/webp': '.webp',
  'image/gif': '.gif',
};

/**
 * Downscale and re-encode an oversized image. Best effort: on any failure the
 * original image is returned and extraction proceeds with it.
 */
export async function compressLargeImage(image: NormalizedImage): Promise<NormalizedImage> {
  if (image.data.length <= COMPRESSION_THRESHOLD_BYTES) {
    return image;
  }

  try {
    const data = await sharp(image.data)
      .rotate()
      .resize({
        width: COMPRESSION_MAX_DIMENSION,
        height: COMPRESSION_MAX_DIMENSION,
        fit: 'inside',
        withoutEnlargement: true,
      })
      .flatten({ background: '#ffffff' })
      .jpeg({ quality: COMPRESSION_JPEG_QUALITY })
      .toBuffer();

    logger.info(
      { originalBytes: image.data.length, compressedBytes: data.length },
      'Compressed large receipt image'
    );
    return { data, mediaType: 'image/jpeg' };
  } catch (error) {
    logger.warn({ error: errorMessage(error) }, 'Failed to compress image, using original');
    return image;
  }
}

async function normalizePdf(bytes: Buffer): Promise<NormalizedDocument> {
  let rendered: Buffer[];
  try {
    rendered = await renderPdfPages(bytes, { maxPages: PDF_MAX_PAGES, dpi: PDF_RENDER_DPI });
  } catch (error) {
    throw new DocumentUnreadableError(`Failed to read PDF: ${errorMessage(error)}`, error);
  }

  const pages: NormalizedImage[] = rendered.map((data) => ({ data, mediaType: 'image/png' }));
  const [firstPage] = pages;
  if (!firstPage) {
    throw new DocumentUnreadableError('Failed to read PDF: document has no pages');
  }

  logger.info({ pageCount: pages.length }, 'Rendered PDF pages');
  return { pages, preview: { ...firstPage, extension: '.png' } };
}

/**
 * Normalize an upload into a non-empty, ordered sequence of page images
 * @param extension - declared file extension, with or without the leading dot
 */
export async function normalizeDocument(
  bytes: Buffer,
  extension: string
): Promise<NormalizedDocument> {
  if (bytes.length === 0) {
    throw new ValidationError('Uploaded file is empty');
  }

  const mediaType = mediaTypeForExtension(extension);

  if (mediaType === 'application/pdf') {
    return normalizePdf(bytes);
  }

  let image: NormalizedImage;
  if (mediaType === 'image/heic') {
    try {
      image = { data: await heicToJpeg(bytes, HEIC_JPEG_QUALITY), mediaType: 'image/jpeg' };
    } catch (error) {
      throw new ConversionFailedError(`Failed to convert HEIC: ${errorMessage(error)}`, error);
    }
  } else {
    image = { data: bytes, mediaType };
  }

  const page = await compressLargeImage(image);
  return {
    pages: [page],
    preview: { ...page, extension: PREVIEW_EXTENSIONS[page.mediaType] },
  };
}
