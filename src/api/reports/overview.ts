import { ApiRequest } from '../../utils/net/types';
import { computeCashflow, computeTotals } from '../../utils/metrics/totals';
import { computeBudgetSummary, computeHealthScore } from '../../utils/metrics/budget';
import { InsightRow } from '../../utils/metrics/insights';
import { formatDate, DateString } from '../../utils/date/date';
import { getReportContext } from './context';
import { netWorthAsOf } from './netWorth';
import { overallVelocity } from './velocity';
import { computeInsightRows, uncategorizedSpending } from './insights';
import {
  SerializedCashflow,
  SerializedNetWorthSnapshot,
  SerializedTotals,
  SerializedVelocity,
  serializeCashflow,
  serializeNetWorthSnapshot,
  serializeTotals,
  serializeVelocity,
} from './serialize';

export type Overview = {
  startDate: DateString;
  endDate: DateString;
  referenceDate: DateString;
  totals: SerializedTotals;
  cashflow: SerializedCashflow;
  velocity: SerializedVelocity;
  netWorth: SerializedNetWorthSnapshot;
  healthScore: number;
  insights: InsightRow[];
};

/**
 * Everything a period review needs in one response
 */
export function getOverview(request: ApiRequest): Overview {
  const context = getReportContext(request);
  const categories = context.ledger.categories;
  const totals = computeTotals(context.transactions, categories);
  const cashflow = computeCashflow(context.transactions, categories, context.window);
  const budget = computeBudgetSummary(context.transactions, categories);
  const netWorth = netWorthAsOf(context);

  return {
    startDate: formatDate(context.startDate),
    endDate: formatDate(context.endDate),
    referenceDate: formatDate(context.referenceDate),
    totals: serializeTotals(totals),
    cashflow: serializeCashflow(cashflow),
    velocity: serializeVelocity(overallVelocity(context, budget, cashflow)),
    netWorth: serializeNetWorthSnapshot(netWorth),
    healthScore: computeHealthScore({
      savingsRate: cashflow.savingsRate,
      budgetUtilization: budget.utilization,
      netWorth,
      uncategorizedCount: uncategorizedSpending(context).count,
    }),
    insights: computeInsightRows(context, cashflow, budget),
  };
}
