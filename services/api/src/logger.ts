/**
 * Structured logger
 */

import pino from 'pino';

const defaultLevel = process.env.NODE_ENV === 'test' ? 'silent' : 'info';

const logger = pino({
  name: 'receiptflow-api',
  level: process.env.LOG_LEVEL || defaultLevel,
  base: { service: 'api' },
});

export default logger;
