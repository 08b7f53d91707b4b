/**
 * Account Routes
 * Register and login are public; everything else sits behind bearer auth
 */

import { Router, type RequestHandler } from 'express';
import type { AuthController } from '../controllers/auth.controller';

export function createPublicAuthRoutes(authController: AuthController): Router {
  const router = Router();

  // POST /api/register - First user becomes super admin, others need an invite code
  router.post('/register', authController.register);

  // POST /api/login - Exchange credentials for a bearer token
  router.post('/login', authController.login);

  return router;
}

export function createSessionRoutes(authController: AuthController, auth: RequestHandler): Router {
  const router = Router();

  router.post('/logout', auth, authController.logout);
  router.get('/me', auth, authController.me);

  return router;
}
