/**
 * Expense Routes
 */

import { Router, type RequestHandler } from 'express';
import type { ExpenseController } from '../controllers/expense.controller';

const BASE_PATH = '/expenses';

export function createExpenseRoutes(
  expenseController: ExpenseController,
  receiptUpload: RequestHandler
): Router {
  const router = Router();

  // POST /api/upload - multipart/form-data with the file in field "receipt"
  router.post('/upload', receiptUpload, expenseController.uploadReceipt);

  router.get(BASE_PATH, expenseController.listExpenses);

  // POST /api/expenses/recalculate - Re-apply current rates to converted totals
  router.post(`${BASE_PATH}/recalculate`, expenseController.recalculate);

  router.get(`${BASE_PATH}/:expenseId`, expenseController.getExpense);
  router.put(`${BASE_PATH}/:expenseId`, expenseController.updateExpense);
  router.delete(`${BASE_PATH}/:expenseId`, expenseController.deleteExpense);

  router.get('/dashboard', expenseController.dashboard);

  // GET /api/export - .xlsx download
  router.get('/export', expenseController.exportExpenses);

  return router;
}
