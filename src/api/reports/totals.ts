import { ApiRequest } from '../../utils/net/types';
import { computeCashflow, computeTotals, largestExpense, largestIncome } from '../../utils/metrics/totals';
import { TransactionData } from '../../data/transaction/types';
import { startTiming, endTiming } from '../../utils/log';
import { getReportContext } from './context';
import { SerializedCashflow, SerializedTotals, serializeCashflow, serializeTotals } from './serialize';

export type TotalsReport = {
  totals: SerializedTotals;
  cashflow: SerializedCashflow;
  largestExpense: TransactionData | null;
  largestIncome: TransactionData | null;
};

/**
 * Inflow, outflow and breakdowns for the window, alongside income-based
 * cashflow figures and the single largest expense and paycheque.
 *
 * @example
 * ```typescript
 * const { totals, cashflow } = getTotals(request);
 * // totals.netChange === '750', cashflow.savingsRate === 0.75
 * ```
 */
export function getTotals(request: ApiRequest): TotalsReport {
  startTiming(getTotals);
  try {
    const context = getReportContext(request);
    const categories = context.ledger.categories;
    return {
      totals: serializeTotals(computeTotals(context.transactions, categories)),
      cashflow: serializeCashflow(computeCashflow(context.transactions, categories, context.window)),
      largestExpense: largestExpense(context.transactions)?.serialize() ?? null,
      largestIncome: largestIncome(context.transactions, categories)?.serialize() ?? null,
    };
  } finally {
    endTiming(getTotals);
  }
}
