/**
 * HEIC/HEIF decoding
 */

import convert from 'heic-convert';

/**
 * Decode a HEIC/HEIF image and re-encode it as JPEG
 * @param quality - JPEG quality, 1-100
 */
export async function heicToJpeg(heic: Buffer, quality: number): Promise<Buffer> {
  const input = heic.buffer.slice(heic.byteOffset, heic.byteOffset + heic.byteLength);
  const output = await convert({ buffer: input, format: 'JPEG', quality: quality / 100 });
  return Buffer.from(output);
}
