/**
 * Error response mapping
 * AppError → its status with { error, kind }; ZodError → 400 with details;
 * multer limits → 400; anything else → 500 with the message hidden.
 */

import type { NextFunction, Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { MulterError } from 'multer';
import { ZodError } from 'zod';
import { AppError } from '../errors';
import logger from '../logger';

export function errorMiddleware(
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const log = logger.child({ method: req.method, path: req.path, userId: req.identity?.userId });

  if (error instanceof AppError) {
    const level = error.statusCode >= StatusCodes.INTERNAL_SERVER_ERROR ? 'error' : 'warn';
    log[level]({ kind: error.kind, error: error.message }, 'Request failed');
    res.status(error.statusCode).json({ error: error.message, kind: error.kind });
    return;
  }

  if (error instanceof ZodError) {
    log.warn({ issues: error.issues.length }, 'Request validation failed');
    res.status(StatusCodes.BAD_REQUEST).json({
      error: error.issues[0]?.message ?? 'Invalid request',
      kind: 'ValidationError',
      details: error.issues,
    });
    return;
  }

  if (error instanceof MulterError) {
    log.warn({ code: error.code }, 'Upload rejected');
    res.status(StatusCodes.BAD_REQUEST).json({
      error: error.code === 'LIMIT_FILE_SIZE' ? 'Uploaded file is too large' : error.message,
      kind: 'ValidationError',
    });
    return;
  }

  // Malformed JSON bodies from express.json()
  if (error instanceof SyntaxError && 'body' in error) {
    res.status(StatusCodes.BAD_REQUEST).json({ error: 'Malformed JSON body', kind: 'ValidationError' });
    return;
  }

  log.error({ err: error }, 'Unhandled error');
  res
    .status(StatusCodes.INTERNAL_SERVER_ERROR)
    .json({ error: 'Internal server error', kind: 'InternalError' });
}
