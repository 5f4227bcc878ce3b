import Decimal from 'decimal.js';
import { ApiRequest } from '../../utils/net/types';
import { Cashflow, computeCashflow, isUncategorized } from '../../utils/metrics/totals';
import { BudgetSummary, computeBudgetSummary } from '../../utils/metrics/budget';
import { InsightRow, buildInsightRows, generateInsights } from '../../utils/metrics/insights';
import { indexById } from '../../utils/array/array';
import { ZERO } from '../../utils/decimal/decimal';
import { startTiming, endTiming } from '../../utils/log';
import { getReportContext, ReportContext } from './context';

export type UncategorizedSpending = {
  count: number;
  amount: Decimal;
};

export function uncategorizedSpending(context: ReportContext): UncategorizedSpending {
  const categoriesById = indexById(context.ledger.categories);
  const expenses = context.transactions.filter(
    (transaction) => transaction.isExpense && isUncategorized(transaction, categoriesById),
  );
  return {
    count: expenses.length,
    amount: expenses.reduce((sum, transaction) => sum.plus(transaction.amount.abs()), ZERO),
  };
}

/**
 * Runs the insight rules over the window and condenses them into at most
 * `maxRows` rows shown to the caller
 */
export function computeInsightRows(context: ReportContext, cashflow: Cashflow, budget: BudgetSummary): InsightRow[] {
  startTiming(computeInsightRows);
  try {
    const categories = context.ledger.categories;
    const thresholds = context.config.insights;
    const insights = generateInsights({
      transactions: context.transactions,
      history: context.history,
      window: context.window,
      referenceDate: context.referenceDate,
      categories,
      income: cashflow.income,
      expenses: cashflow.expenses,
      savingsRate: cashflow.savingsRate,
      thresholds,
    });
    const uncategorized = uncategorizedSpending(context);
    return buildInsightRows({
      insights,
      uncategorizedCount: uncategorized.count,
      uncategorizedAmount: uncategorized.amount,
      savingsRate: cashflow.savingsRate,
      income: cashflow.income,
      expenses: cashflow.expenses,
      expenseCategoryIds: new Set(
        categories.filter((category) => category.groupType === 'expense').map((category) => category.id),
      ),
      overBudget: budget.overBudget,
      budgetAssigned: budget.assigned,
      thresholds,
    });
  } finally {
    endTiming(computeInsightRows);
  }
}

export function getInsights(request: ApiRequest): InsightRow[] {
  const context = getReportContext(request);
  const categories = context.ledger.categories;
  return computeInsightRows(
    context,
    computeCashflow(context.transactions, categories, context.window),
    computeBudgetSummary(context.transactions, categories),
  );
}
