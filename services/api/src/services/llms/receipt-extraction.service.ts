/**
 * Receipt Extraction Service
 * Sends every normalized page, in order, with the extraction prompt in a single
 * vision request and parses the reply. Persists nothing and never retries.
 */

import OpenAI from 'openai';
import type { ChatCompletionContentPart } from 'openai/resources/chat/completions';
import type { NormalizedImage, ReceiptExtraction } from '../../../../../shared/types';
import { ExtractionUnavailableError, ValidationError, errorMessage } from '../../errors';
import logger from '../../logger';
import { RECEIPT_EXTRACTION_PROMPT } from './prompts';
import { parseExtractionResponse } from './receipt-parser';

export interface ReceiptExtractor {
  extractReceipt(pages: NormalizedImage[]): Promise<ReceiptExtraction>;
}

export interface OpenAIExtractorOptions {
  model: string;
  maxTokens: number;
  timeoutMs: number;
}

export function toImagePart(page: NormalizedImage): ChatCompletionContentPart {
  return {
    type: 'image_url',
    image_url: { url: `data:${page.mediaType};base64,${page.data.toString('base64')}` },
  };
}

export class OpenAIReceiptExtractor implements ReceiptExtractor {
  constructor(
    private openai: OpenAI,
    private options: OpenAIExtractorOptions
  ) {}

  async extractReceipt(pages: NormalizedImage[]): Promise<ReceiptExtraction> {
    if (pages.length === 0) {
      throw new ValidationError('No pages to extract');
    }

    const log = logger.child({ model: this.options.model, pageCount: pages.length });
    const content: ChatCompletionContentPart[] = [
      ...pages.map(toImagePart),
      { type: 'text', text: RECEIPT_EXTRACTION_PROMPT },
    ];

    let text: string;
    const startTime = Date.now();
    try {
      const completion = await this.openai.chat.completions.create(
        {
          model: this.options.model,
          max_tokens: this.options.maxTokens,
          messages: [{ role: 'user', content }],
        },
        { timeout: this.options.timeoutMs, maxRetries: 0 }
      );
      text = completion.choices[0]?.message.content ?? '';
    } catch (error) {
      log.error({ error: errorMessage(error) }, 'Extraction request failed');
      throw new ExtractionUnavailableError(
        `Extraction service unavailable: ${errorMessage(error)}`,
        error
      );
    }

    log.info({ durationMs: Date.now() - startTime }, 'Extraction completed');
    return parseExtractionResponse(text);
  }
}

export function createOpenAIReceiptExtractor(
  apiKey: string,
  options: OpenAIExtractorOptions
): OpenAIReceiptExtractor {
  return new OpenAIReceiptExtractor(new OpenAI({ apiKey }), options);
}
