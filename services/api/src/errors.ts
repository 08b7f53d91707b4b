/**
 * Error taxonomy
 * Every terminal failure carries a stable kind, a human-readable message and an HTTP status
 */

import { StatusCodes } from 'http-status-codes';

export type ErrorKind =
  | 'ValidationError'
  | 'Unauthorized'
  | 'AccessDenied'
  | 'NotFound'
  | 'ConversionFailed'
  | 'DocumentUnreadable'
  | 'ExtractionUnavailable'
  | 'ExtractionParseFailed'
  | 'RateFetchDegraded';

export class AppError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly statusCode: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = kind;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'ValidationError', StatusCodes.BAD_REQUEST);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Not logged in') {
    super(message, 'Unauthorized', StatusCodes.UNAUTHORIZED);
  }
}

export class AccessDeniedError extends AppError {
  constructor(message = 'Access denied') {
    super(message, 'AccessDenied', StatusCodes.FORBIDDEN);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'NotFound', StatusCodes.NOT_FOUND);
  }
}

export class ConversionFailedError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'ConversionFailed', StatusCodes.BAD_REQUEST, { cause });
  }
}

export class DocumentUnreadableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'DocumentUnreadable', StatusCodes.BAD_REQUEST, { cause });
  }
}

export class ExtractionUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'ExtractionUnavailable', StatusCodes.BAD_GATEWAY, { cause });
  }
}

export class ExtractionParseFailedError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'ExtractionParseFailed', StatusCodes.BAD_GATEWAY, { cause });
  }
}

/**
 * Internal signal: the rate source failed and a stale or fallback table is served.
 * Logged, never surfaced to callers.
 */
export class RateFetchDegradedError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'RateFetchDegraded', StatusCodes.SERVICE_UNAVAILABLE, { cause });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
