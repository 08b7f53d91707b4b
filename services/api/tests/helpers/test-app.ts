/**
 * Express app wired to in-process stand-ins
 */

import { createApp } from '../../src/app';
import { createServices } from '../../src/container';
import { createInMemoryRepositories } from './in-memory-repositories';
import { FakeImageStore, fakeExtractor, offlineCurrencyService } from './fixtures';

export const TEST_MAX_UPLOAD_BYTES = 64 * 1024;

export function buildTestApp() {
  const repositories = createInMemoryRepositories();
  const images = new FakeImageStore();
  const { extractor, extractReceipt } = fakeExtractor();
  const { currency } = offlineCurrencyService();

  const services = createServices({
    repositories,
    images,
    extractor,
    currency,
    sessionTtlMs: 60 * 60 * 1000,
  });
  const app = createApp(services, { maxUploadBytes: TEST_MAX_UPLOAD_BYTES });

  return { app, repositories, images, extractReceipt };
}
