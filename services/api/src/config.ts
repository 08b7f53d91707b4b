/**
 * Service configuration
 * Parsed from the environment once and cached
 */

import { z } from 'zod';

const intFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const ConfigSchema = z.object({
  PORT: intFromEnv(8080),
  GCP_PROJECT_ID: z.string().optional(),
  RECEIPTS_BUCKET: z.string().optional(),

  // Vision extraction
  OPENAI_API_KEY: z.string().default(''),
  OPENAI_MODEL: z.string().default('gpt-4o'),
  EXTRACTION_TIMEOUT_MS: intFromEnv(60_000),
  EXTRACTION_MAX_TOKENS: intFromEnv(1000),

  // Exchange rates
  EXCHANGE_RATE_URL: z.string().url().default('https://open.er-api.com/v6/latest/USD'),
  EXCHANGE_RATE_TIMEOUT_MS: intFromEnv(5000),
  RATE_CACHE_TTL_MINUTES: intFromEnv(60),
  RATE_RETRY_BACKOFF_SECONDS: intFromEnv(60),

  // Accounts and uploads
  SESSION_TTL_HOURS: intFromEnv(24 * 7),
  MAX_UPLOAD_MB: intFromEnv(50),
});

export interface Config {
  port: number;
  receiptsBucket: string;
  openaiApiKey: string;
  openaiModel: string;
  extractionTimeoutMs: number;
  extractionMaxTokens: number;
  exchangeRateUrl: string;
  exchangeRateTimeoutMs: number;
  rateCacheTtlMs: number;
  rateRetryBackoffMs: number;
  sessionTtlMs: number;
  maxUploadBytes: number;
}

let cachedConfig: Config | null = null;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.parse(env);

  return {
    port: parsed.PORT,
    receiptsBucket: parsed.RECEIPTS_BUCKET || `${parsed.GCP_PROJECT_ID ?? 'receiptflow'}-receipts`,
    openaiApiKey: parsed.OPENAI_API_KEY,
    openaiModel: parsed.OPENAI_MODEL,
    extractionTimeoutMs: parsed.EXTRACTION_TIMEOUT_MS,
    extractionMaxTokens: parsed.EXTRACTION_MAX_TOKENS,
    exchangeRateUrl: parsed.EXCHANGE_RATE_URL,
    exchangeRateTimeoutMs: parsed.EXCHANGE_RATE_TIMEOUT_MS,
    rateCacheTtlMs: parsed.RATE_CACHE_TTL_MINUTES * 60 * 1000,
    rateRetryBackoffMs: parsed.RATE_RETRY_BACKOFF_SECONDS * 1000,
    sessionTtlMs: parsed.SESSION_TTL_HOURS * 60 * 60 * 1000,
    maxUploadBytes: parsed.MAX_UPLOAD_MB * 1024 * 1024,
  };
}

export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
