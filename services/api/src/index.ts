/**
 * API entry point
 */

import { getConfig } from './config';
import { createApp } from './app';
import { createServices } from './container';
import logger from './logger';
import { createFirestoreRepositories } from './repositories';
import { CurrencyService } from './services/currency/currency.service';
import { createOpenAIReceiptExtractor } from './services/llms/receipt-extraction.service';
import { GcsReceiptImageStore } from './services/storage/receipt-image.store';
import { getFirestore, getStorage } from './services/storage/store.service';

const config = getConfig();

const services = createServices({
  repositories: createFirestoreRepositories(getFirestore()),
  images: new GcsReceiptImageStore(getStorage(), config.receiptsBucket),
  extractor: createOpenAIReceiptExtractor(config.openaiApiKey, {
    model: config.openaiModel,
    maxTokens: config.extractionMaxTokens,
    timeoutMs: config.extractionTimeoutMs,
  }),
  currency: new CurrencyService({
    sourceUrl: config.exchangeRateUrl,
    cacheTtlMs: config.rateCacheTtlMs,
    retryBackoffMs: config.rateRetryBackoffMs,
    timeoutMs: config.exchangeRateTimeoutMs,
  }),
  sessionTtlMs: config.sessionTtlMs,
});

const app = createApp(services, { maxUploadBytes: config.maxUploadBytes });

app.listen(config.port, () => {
  logger.info({ port: config.port, bucket: config.receiptsBucket }, 'API server listening');
});
