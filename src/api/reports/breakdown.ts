import * as csv from 'fast-csv';
import { ApiRequest } from '../../utils/net/types';
import { ApiError } from '../../utils/net/errors';
import { BreakdownEntry, expensesByCategory, expensesByPayee, incomeByCategory } from '../../utils/metrics/totals';
import { serializeDecimal } from '../../utils/decimal/decimal';
import { getReportContext, ReportContext } from './context';
import { SerializedBreakdownEntry, serializeBreakdown } from './serialize';

const BREAKDOWNS = {
  categories: (context: ReportContext) => expensesByCategory(context.transactions, context.ledger.categories),
  payees: (context: ReportContext) => expensesByPayee(context.transactions),
  income: (context: ReportContext) => incomeByCategory(context.transactions, context.ledger.categories),
} satisfies Record<string, (context: ReportContext) => BreakdownEntry[]>;

type BreakdownKind = keyof typeof BREAKDOWNS;

function isBreakdownKind(value: string): value is BreakdownKind {
  return Object.hasOwn(BREAKDOWNS, value);
}

function getBreakdownKind(request: ApiRequest): BreakdownKind {
  const value = request.query.by ?? 'categories';
  if (typeof value !== 'string' || !isBreakdownKind(value)) {
    throw new ApiError(`Invalid breakdown '${String(value)}'`);
  }
  return value;
}

/**
 * Spending per category in the window. Uncategorized spending is grouped
 * under "Uncategorized", so the amounts add up to the window's outflow.
 */
export function getCategoryBreakdown(request: ApiRequest): SerializedBreakdownEntry[] {
  return serializeBreakdown(BREAKDOWNS.categories(getReportContext(request)));
}

export function getPayeeBreakdown(request: ApiRequest): SerializedBreakdownEntry[] {
  return serializeBreakdown(BREAKDOWNS.payees(getReportContext(request)));
}

export function getIncomeBreakdown(request: ApiRequest): SerializedBreakdownEntry[] {
  return serializeBreakdown(BREAKDOWNS.income(getReportContext(request)));
}

/**
 * Renders a breakdown (`by=categories|payees|income`) as CSV with a header row
 */
export async function exportBreakdown(request: ApiRequest): Promise<string> {
  const kind = getBreakdownKind(request);
  const entries = BREAKDOWNS[kind](getReportContext(request));
  return csv.writeToString(
    entries.map((entry) => [entry.label, serializeDecimal(entry.amount), entry.count]),
    { headers: ['label', 'amount', 'count'] },
  );
}
