/**
 * Company controller
 * Tenant management for the super admin and settings for company admins
 */

import type { NextFunction, Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { requireIdentity } from '../middleware/auth.middleware';
import type { CompanyService } from '../services/companies/company.service';
import { requestedCompanyId } from './request-params';

export class CompanyController {
  constructor(private companyService: CompanyService) {}

  listCompanies = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const companies = await this.companyService.listCompanies(requireIdentity(req));
      res.json({ companies });
    } catch (error) {
      next(error);
    }
  };

  createCompany = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const created = await this.companyService.createCompany(requireIdentity(req), req.body);
      res.status(StatusCodes.CREATED).json({ success: true, ...created });
    } catch (error) {
      next(error);
    }
  };

  deleteCompany = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const deletion = await this.companyService.deleteCompany(
        requireIdentity(req),
        req.params.companyId
      );
      res.json({ success: true, ...deletion });
    } catch (error) {
      next(error);
    }
  };

  updateSettings = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const update = await this.companyService.updateCompanySettings(
        requireIdentity(req),
        requestedCompanyId(req),
        req.body
      );
      res.json({ success: true, ...update });
    } catch (error) {
      next(error);
    }
  };
}
