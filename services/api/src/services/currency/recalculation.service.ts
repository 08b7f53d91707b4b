/**
 * Converted-total recalculation
 * Re-applies the current rate table to stored billed totals. Only totalHome and
 * totalUsd are written, and only where they changed, so repeated runs converge.
 */

import {
  REFERENCE_CURRENCY,
  type ConvertedTotals,
  type Identity,
  type RecalculationResult,
} from '../../../../../shared/types';
import { NotFoundError } from '../../errors';
import logger from '../../logger';
import type { CompanyRepository, ExpenseRepository } from '../../repositories';
import { requireAccess } from '../access/access-policy.service';
import { convertWithRates, type CurrencyService } from './currency.service';

export class RecalculationService {
  constructor(
    private expenses: ExpenseRepository,
    private companies: CompanyRepository,
    private currency: CurrencyService
  ) {}

  /**
   * Recalculate every expense in the caller's scope.
   * A super admin without a company filter recalculates all companies, each against
   * its own home currency; unassigned rows use USD.
   */
  async recalculateCompany(
    identity: Identity,
    companyId?: string | null
  ): Promise<RecalculationResult> {
    const scope = requireAccess(identity, 'company:settings', companyId);
    const log = logger.child({ userId: identity.userId, scope: scope.kind });

    const homeCurrencies = new Map<string, string>();
    let resultCompanyId: string | null = null;
    let resultCurrency: string = REFERENCE_CURRENCY;

    if (scope.kind === 'company') {
      const company = await this.companies.findById(scope.companyId);
      if (!company) {
        throw new NotFoundError('Company not found');
      }
      homeCurrencies.set(company.id, company.homeCurrency);
      resultCompanyId = company.id;
      resultCurrency = company.homeCurrency;
    } else {
      for (const company of await this.companies.list()) {
        homeCurrencies.set(company.id, company.homeCurrency);
      }
    }

    const [expenses, { rates, source }] = await Promise.all([
      this.expenses.list(scope),
      this.currency.getRates(),
    ]);

    const changed: ConvertedTotals[] = [];
    for (const expense of expenses) {
      const home =
        (expense.companyId && homeCurrencies.get(expense.companyId)) || REFERENCE_CURRENCY;
      const totalHome = convertWithRates(expense.total, expense.currency, home, rates);
      const totalUsd = convertWithRates(expense.total, expense.currency, REFERENCE_CURRENCY, rates);
      if (totalHome !== expense.totalHome || totalUsd !== expense.totalUsd) {
        changed.push({ id: expense.id, totalHome, totalUsd });
      }
    }

    const updated = changed.length > 0 ? await this.expenses.setConvertedTotals(changed) : 0;
    log.info(
      { companyId: resultCompanyId, scanned: expenses.length, updated, rateSource: source },
      'Recalculated converted totals'
    );

    return { companyId: resultCompanyId, homeCurrency: resultCurrency, updated };
  }
}
