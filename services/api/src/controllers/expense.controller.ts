/**
 * Expense controller
 * Receipt upload, ledger queries and edits, dashboard, recalculation and export
 */

import type { NextFunction, Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { ValidationError } from '../errors';
import { requireIdentity } from '../middleware/auth.middleware';
import type { RecalculationService } from '../services/currency/recalculation.service';
import type { ExpenseService } from '../services/expenses/expense.service';
import { XLSX_CONTENT_TYPE } from '../services/export/excel-export.service';
import type { IngestionService } from '../services/ingestion/ingestion.service';
import { requestedCompanyId } from './request-params';

export class ExpenseController {
  constructor(
    private expenseService: ExpenseService,
    private ingestionService: IngestionService,
    private recalculationService: RecalculationService
  ) {}

  uploadReceipt = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const identity = requireIdentity(req);
      if (!req.file) {
        throw new ValidationError('No file uploaded');
      }
      const expense = await this.ingestionService.ingestReceipt(identity, {
        fileName: req.file.originalname,
        bytes: req.file.buffer,
        companyId: requestedCompanyId(req),
      });
      res.status(StatusCodes.CREATED).json({ success: true, expense });
    } catch (error) {
      next(error);
    }
  };

  listExpenses = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const expenses = await this.expenseService.list(requireIdentity(req), {
        companyId: requestedCompanyId(req),
      });
      res.json({ expenses });
    } catch (error) {
      next(error);
    }
  };

  getExpense = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const expense = await this.expenseService.get(requireIdentity(req), req.params.expenseId);
      res.json({ expense });
    } catch (error) {
      next(error);
    }
  };

  updateExpense = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const expense = await this.expenseService.update(
        requireIdentity(req),
        req.params.expenseId,
        req.body
      );
      res.json({ success: true, expense });
    } catch (error) {
      next(error);
    }
  };

  deleteExpense = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await this.expenseService.delete(requireIdentity(req), req.params.expenseId);
      res.json({ success: true });
    } catch (error) {
      next(error);
    }
  };

  dashboard = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const summary = await this.expenseService.dashboard(requireIdentity(req), {
        companyId: requestedCompanyId(req),
      });
      res.json(summary);
    } catch (error) {
      next(error);
    }
  };

  recalculate = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const result = await this.recalculationService.recalculateCompany(
        requireIdentity(req),
        requestedCompanyId(req)
      );
      res.json({ success: true, ...result });
    } catch (error) {
      next(error);
    }
  };

  exportExpenses = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { fileName, buffer } = await this.expenseService.exportWorkbook(requireIdentity(req), {
        companyId: requestedCompanyId(req),
      });
      res.setHeader('Content-Type', XLSX_CONTENT_TYPE);
      res.setHeader('Content-Disposition', `attachment; filename="${fileName}"`);
      res.send(buffer);
    } catch (error) {
      next(error);
    }
  };
}
