/**
 * Service wiring
 * Builds every service from its collaborators; production passes Firestore,
 * Cloud Storage and OpenAI implementations, tests pass in-memory fakes.
 */

import type { Repositories } from './repositories';
import { AuthService } from './services/accounts/auth.service';
import { CompanyService } from './services/companies/company.service';
import type { CurrencyService } from './services/currency/currency.service';
import { RecalculationService } from './services/currency/recalculation.service';
import { ExpenseService } from './services/expenses/expense.service';
import { IngestionService } from './services/ingestion/ingestion.service';
import type { ReceiptExtractor } from './services/llms/receipt-extraction.service';
import type { ReceiptImageStore } from './services/storage/receipt-image.store';
import { TeamService } from './services/team/team.service';

export interface ServiceDependencies {
  repositories: Repositories;
  images: ReceiptImageStore;
  extractor: ReceiptExtractor;
  currency: CurrencyService;
  sessionTtlMs: number;
}

export interface AppServices {
  auth: AuthService;
  companies: CompanyService;
  team: TeamService;
  expenses: ExpenseService;
  ingestion: IngestionService;
  recalculation: RecalculationService;
}

export function createServices(deps: ServiceDependencies): AppServices {
  const { companies, users, inviteCodes, sessions, expenses } = deps.repositories;

  const recalculation = new RecalculationService(expenses, companies, deps.currency);
  const expenseService = new ExpenseService(expenses, companies, deps.images);

  return {
    auth: new AuthService(users, sessions, companies, { sessionTtlMs: deps.sessionTtlMs }),
    companies: new CompanyService(
      companies,
      users,
      expenses,
      inviteCodes,
      deps.images,
      recalculation
    ),
    team: new TeamService(users, inviteCodes, sessions, companies),
    expenses: expenseService,
    ingestion: new IngestionService(
      deps.extractor,
      deps.currency,
      expenseService,
      companies,
      deps.images
    ),
    recalculation,
  };
}
