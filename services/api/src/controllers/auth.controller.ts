/**
 * Account controller
 * Registration, login/logout and the current identity
 */

import type { NextFunction, Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { requireIdentity } from '../middleware/auth.middleware';
import type { AuthService } from '../services/accounts/auth.service';

export class AuthController {
  constructor(private authService: AuthService) {}

  register = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const result = await this.authService.register(req.body);
      res.status(StatusCodes.CREATED).json({ success: true, ...result });
    } catch (error) {
      next(error);
    }
  };

  login = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const result = await this.authService.login(req.body);
      res.json({ success: true, ...result });
    } catch (error) {
      next(error);
    }
  };

  logout = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      if (req.sessionToken) {
        await this.authService.logout(req.sessionToken);
      }
      res.json({ success: true });
    } catch (error) {
      next(error);
    }
  };

  me = (req: Request, res: Response, next: NextFunction): void => {
    try {
      res.json({ loggedIn: true, ...requireIdentity(req) });
    } catch (error) {
      next(error);
    }
  };
}
