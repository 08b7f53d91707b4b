/**
 * Receipt extraction response parsing
 * Unwraps the extractor's text and coerces it into a complete ReceiptExtraction
 */

import { z } from 'zod';
import type { ReceiptExtraction } from '../../../../../shared/types';
import { ExtractionParseFailedError, errorMessage } from '../../errors';
import { normalizeCurrencyCode } from '../currency/currency-code';
import { normalizeCategory } from '../expenses/categories';

const FENCE = '```';

/**
 * Strip a Markdown code fence (```json ... ```) around the JSON payload
 */
export function stripCodeFence(text: string): string {
  let body = text.trim();
  if (!body.startsWith(FENCE)) {
    return body;
  }

  const newline = body.indexOf('\n');
  body = newline === -1 ? body.slice(FENCE.length) : body.slice(newline + 1);

  const closing = body.lastIndexOf(FENCE);
  if (closing !== -1) {
    body = body.slice(0, closing);
  }
  return body.trim();
}

function toAmount(value: unknown): number {
  const amount =
    typeof value === 'number'
      ? value
      : typeof value === 'string'
        ? Number.parseFloat(value.replace(/[^0-9.-]/g, ''))
        : Number.NaN;
  return Number.isFinite(amount) && amount > 0 ? amount : 0;
}

function toText(value: unknown): string {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return '';
}

const amount = z.unknown().transform(toAmount);
const text = z.unknown().transform(toText);

const ReceiptExtractionSchema = z.object({
  date: text,
  vendor: text,
  location: text,
  category: z.unknown().transform(normalizeCategory),
  subtotal: amount,
  tax: amount,
  tip: amount,
  total: amount,
  payment_method: text,
  currency: z.unknown().transform((value) => normalizeCurrencyCode(toText(value))),
  items: z
    .unknown()
    .transform((value) => (Array.isArray(value) ? value.map(toText).join(', ') : toText(value))),
});

/**
 * Parse the extractor's raw text. Missing amounts become 0, unknown categories "Other".
 * Throws ExtractionParseFailed when no JSON object can be read.
 */
export function parseExtractionResponse(raw: string): ReceiptExtraction {
  const body = stripCodeFence(raw);
  if (!body) {
    throw new ExtractionParseFailedError('Extractor returned an empty response');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new ExtractionParseFailedError(
      `Failed to parse extraction response: ${errorMessage(error)}`,
      error
    );
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ExtractionParseFailedError('Extraction response is not a JSON object');
  }

  const fields = ReceiptExtractionSchema.parse(parsed);
  return {
    date: fields.date,
    vendor: fields.vendor,
    location: fields.location,
    category: fields.category,
    subtotal: fields.subtotal,
    tax: fields.tax,
    tip: fields.tip,
    total: fields.total,
    paymentMethod: fields.payment_method,
    currency: fields.currency,
    items: fields.items,
  };
}
