import { ApiRequest } from '../../utils/net/types';
import { computeSpendingVelocity, SpendingVelocity } from '../../utils/metrics/velocity';
import { BudgetSummary, computeBudgetSummary } from '../../utils/metrics/budget';
import { Cashflow, computeCashflow } from '../../utils/metrics/totals';
import { getReportContext, ReportContext } from './context';
import { SerializedVelocity, serializeVelocity } from './serialize';

export type VelocityReport = {
  overall: SerializedVelocity;
  categories: (SerializedVelocity & { categoryId: string; name: string })[];
};

/**
 * Pace of every outflow in the window, uncategorized spending included,
 * against the total assigned budget
 */
export function overallVelocity(context: ReportContext, budget: BudgetSummary, cashflow: Cashflow): SpendingVelocity {
  return computeSpendingVelocity(
    {
      periodStart: context.startDate,
      periodEnd: context.endDate,
      referenceDate: context.referenceDate,
      spent: cashflow.expenses,
      assigned: budget.assigned,
    },
    context.config.velocity,
  );
}

/**
 * Spending pace for the window overall and for each expense category
 */
export function getVelocity(request: ApiRequest): VelocityReport {
  const context = getReportContext(request);
  const categories = context.ledger.categories;
  const budget = computeBudgetSummary(context.transactions, categories);
  const cashflow = computeCashflow(context.transactions, categories, context.window);

  return {
    overall: serializeVelocity(overallVelocity(context, budget, cashflow)),
    categories: budget.categories.map((row) => ({
      categoryId: row.categoryId,
      name: row.name,
      ...serializeVelocity(
        computeSpendingVelocity(
          {
            periodStart: context.startDate,
            periodEnd: context.endDate,
            referenceDate: context.referenceDate,
            spent: row.spent,
            assigned: row.assigned,
          },
          context.config.velocity,
        ),
      ),
    })),
  };
}
