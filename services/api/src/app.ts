/**
 * Express application
 */

import express, { type Express } from 'express';
import type { AppServices } from './container';
import { AuthController } from './controllers/auth.controller';
import { CompanyController } from './controllers/company.controller';
import { ExpenseController } from './controllers/expense.controller';
import { TeamController } from './controllers/team.controller';
import { createAuthMiddleware } from './middleware/auth.middleware';
import { errorMiddleware } from './middleware/error.middleware';
import { createReceiptUpload } from './middleware/upload.middleware';
import { createPublicAuthRoutes, createSessionRoutes } from './routes/auth.routes';
import { createCompanyRoutes } from './routes/company.routes';
import { createExpenseRoutes } from './routes/expense.routes';
import { createTeamRoutes } from './routes/team.routes';

export const SERVICE_NAME = 'receiptflow-api';

export interface AppOptions {
  maxUploadBytes: number;
}

export function createApp(services: AppServices, options: AppOptions): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));

  // Health check (no auth)
  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      service: SERVICE_NAME,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  });

  const auth = createAuthMiddleware(services.auth);
  const authController = new AuthController(services.auth);

  app.use('/api', createPublicAuthRoutes(authController));
  app.use('/api', createSessionRoutes(authController, auth));

  // Everything below requires a session
  const protectedRoutes = express.Router();
  protectedRoutes.use(auth);
  protectedRoutes.use(createCompanyRoutes(new CompanyController(services.companies)));
  protectedRoutes.use(createTeamRoutes(new TeamController(services.team)));
  protectedRoutes.use(
    createExpenseRoutes(
      new ExpenseController(services.expenses, services.ingestion, services.recalculation),
      createReceiptUpload(options.maxUploadBytes)
    )
  );
  app.use('/api', protectedRoutes);

  app.use(errorMiddleware);

  return app;
}
