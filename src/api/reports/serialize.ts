import { formatDate, DateString } from '../../utils/date/date';
import { serializeDecimal } from '../../utils/decimal/decimal';
import { BreakdownEntry, Cashflow, Totals } from '../../utils/metrics/totals';
import { NetWorthPoint, NetWorthSnapshot } from '../../utils/metrics/netWorth';
import { SpendingVelocity, VelocityStatus } from '../../utils/metrics/velocity';
import { BudgetSummary } from '../../utils/metrics/budget';

export type SerializedBreakdownEntry = {
  key: string;
  label: string;
  amount: string;
  count: number;
};

export type SerializedTotals = {
  inflow: string;
  outflow: string;
  netChange: string;
  transactionCount: number;
  byCategory: SerializedBreakdownEntry[];
  byPayee: SerializedBreakdownEntry[];
};

export type SerializedCashflow = {
  income: string;
  expenses: string;
  netChange: string;
  savingsRate: number | null;
  averageDailySpend: string;
  averageDailyIncome: string;
  days: number;
};

export type SerializedNetWorthSnapshot = {
  assets: string;
  debt: string;
  netWorth: string;
};

export type SerializedNetWorthPoint = SerializedNetWorthSnapshot & {
  monthStart: DateString;
};

export type SerializedVelocity = {
  periodStart: DateString;
  periodEnd: DateString;
  daysInPeriod: number;
  daysElapsed: number;
  daysRemaining: number;
  spent: string;
  assigned: string;
  dailyRate: string;
  targetDailyRate: string;
  ratio: number;
  projectedSpent: string;
  projectedRemaining: string;
  projectedOverBudget: string;
  status: VelocityStatus;
  isUsable: boolean;
  isPeriodComplete: boolean;
  periodProgress: number;
};

export type SerializedBudgetSummary = {
  categories: {
    categoryId: string;
    name: string;
    assigned: string;
    spent: string;
    remaining: string;
    utilization: number | null;
  }[];
  assigned: string;
  spent: string;
  remaining: string;
  utilization: number | null;
  overBudget: { categoryId: string; name: string; overBy: string }[];
};

export function serializeBreakdown(entries: BreakdownEntry[]): SerializedBreakdownEntry[] {
  return entries.map((entry) => ({ ...entry, amount: serializeDecimal(entry.amount) }));
}

export function serializeTotals(totals: Totals): SerializedTotals {
  return {
    inflow: serializeDecimal(totals.inflow),
    outflow: serializeDecimal(totals.outflow),
    netChange: serializeDecimal(totals.netChange),
    transactionCount: totals.transactionCount,
    byCategory: serializeBreakdown(totals.byCategory),
    byPayee: serializeBreakdown(totals.byPayee),
  };
}

export function serializeCashflow(cashflow: Cashflow): SerializedCashflow {
  return {
    ...cashflow,
    income: serializeDecimal(cashflow.income),
    expenses: serializeDecimal(cashflow.expenses),
    netChange: serializeDecimal(cashflow.netChange),
    averageDailySpend: serializeDecimal(cashflow.averageDailySpend),
    averageDailyIncome: serializeDecimal(cashflow.averageDailyIncome),
  };
}

export function serializeNetWorthSnapshot({ assets, debt, netWorth }: NetWorthSnapshot): SerializedNetWorthSnapshot {
  return {
    assets: serializeDecimal(assets),
    debt: serializeDecimal(debt),
    netWorth: serializeDecimal(netWorth),
  };
}

export function serializeNetWorthPoint(point: NetWorthPoint): SerializedNetWorthPoint {
  return { monthStart: formatDate(point.monthStart), ...serializeNetWorthSnapshot(point) };
}

export function serializeVelocity(velocity: SpendingVelocity): SerializedVelocity {
  return {
    ...velocity,
    periodStart: formatDate(velocity.periodStart),
    periodEnd: formatDate(velocity.periodEnd),
    spent: serializeDecimal(velocity.spent),
    assigned: serializeDecimal(velocity.assigned),
    dailyRate: serializeDecimal(velocity.dailyRate),
    targetDailyRate: serializeDecimal(velocity.targetDailyRate),
    projectedSpent: serializeDecimal(velocity.projectedSpent),
    projectedRemaining: serializeDecimal(velocity.projectedRemaining),
    projectedOverBudget: serializeDecimal(velocity.projectedOverBudget),
  };
}

export function serializeBudgetSummary(summary: BudgetSummary): SerializedBudgetSummary {
  return {
    categories: summary.categories.map((row) => ({
      ...row,
      assigned: serializeDecimal(row.assigned),
      spent: serializeDecimal(row.spent),
      remaining: serializeDecimal(row.remaining),
    })),
    assigned: serializeDecimal(summary.assigned),
    spent: serializeDecimal(summary.spent),
    remaining: serializeDecimal(summary.remaining),
    utilization: summary.utilization,
    overBudget: summary.overBudget.map((row) => ({ ...row, overBy: serializeDecimal(row.overBy) })),
  };
}
