/**
 * Bearer session authentication
 * Resolves `Authorization: Bearer <token>` to the caller's identity for every
 * protected route.
 */

import type { NextFunction, Request, Response } from 'express';
import type { Identity } from '../../../../shared/types';
import { UnauthorizedError } from '../errors';
import type { AuthService } from '../services/accounts/auth.service';

declare global {
  namespace Express {
    interface Request {
      identity?: Identity;
      sessionToken?: string;
    }
  }
}

export function bearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header?.startsWith('Bearer ')) {
    return null;
  }
  const token = header.slice('Bearer '.length).trim();
  return token || null;
}

export function createAuthMiddleware(auth: AuthService) {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      const token = bearerToken(req);
      if (!token) {
        throw new UnauthorizedError();
      }
      req.identity = await auth.resolveSession(token);
      req.sessionToken = token;
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Identity attached by the auth middleware
 */
export function requireIdentity(req: Request): Identity {
  if (!req.identity) {
    throw new UnauthorizedError();
  }
  return req.identity;
}
