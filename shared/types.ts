/**
 * Shared Types entry point used by the services
 */

export * from './index';
