/**
 * Company Routes
 */

import { Router } from 'express';
import type { CompanyController } from '../controllers/company.controller';

const BASE_PATH = '/companies';

export function createCompanyRoutes(companyController: CompanyController): Router {
  const router = Router();

  // GET /api/companies - Companies with user/expense counts (super admin)
  router.get(BASE_PATH, companyController.listCompanies);

  // POST /api/companies - Create a company and its admin invite (super admin)
  router.post(BASE_PATH, companyController.createCompany);

  // PATCH /api/companies/settings - Rename or change home currency
  router.patch(`${BASE_PATH}/settings`, companyController.updateSettings);

  // DELETE /api/companies/:companyId - Cascade delete (super admin)
  router.delete(`${BASE_PATH}/:companyId`, companyController.deleteCompany);

  return router;
}
