import Decimal from 'decimal.js';
import { Transaction } from '../../data/transaction/transaction';
import { Category, UNCATEGORIZED } from '../../data/category/category';
import { DEFAULT_INSIGHT_THRESHOLDS, InsightThresholds } from '../config/metricsConfig';
import { ZERO, formatAmount } from '../decimal/decimal';
import {
  DateWindow,
  addDays,
  addMonths,
  addYears,
  daysBetween,
  daysInclusive,
  endOfMonth,
  formatShortDate,
  isSame,
  isWithinWindow,
  maxDate,
  minDate,
  startOfMonth,
  startOfYear,
} from '../date/date';
import { normalizePayeeDisplay, normalizePayeeForComparison } from '../payee/payee';
import { indexById } from '../array/array';
import { isIncomeCategorized } from './totals';
import { OverBudgetCategory } from './budget';

export type InsightType =
  | 'recurringExpense'
  | 'unusualSpending'
  | 'budgetProjection'
  | 'savingsOpportunity'
  | 'smallPurchases'
  | 'upcomingBill'
  | 'spendingTrend'
  | 'incomeVariation';

export type InsightSeverity = 'alert' | 'warning' | 'info';

export type Insight = {
  id: string;
  type: InsightType;
  title: string;
  description: string;
  why: string | null;
  severity: InsightSeverity;
  actionable: boolean;
  relatedCategoryId: string | null;
  relatedCategoryName: string | null;
  relatedPayee: string | null;
};

export type InsightInput = {
  // Reportable transactions inside the window
  transactions: Transaction[];
  // Reportable transactions across the whole ledger
  history: Transaction[];
  window: DateWindow;
  referenceDate: Date;
  categories: Category[];
  income: Decimal;
  expenses: Decimal;
  savingsRate: number | null;
  thresholds?: InsightThresholds;
};

export type ComparisonRange = DateWindow & {
  label: 'last month' | 'last year' | 'previous period';
};

const SEVERITY_ORDER: Record<InsightSeverity, number> = { alert: 0, warning: 1, info: 2 };

const MONTHLY_MIN_DAYS = 25;
const MONTHLY_MAX_DAYS = 35;
const HISTORY_MONTHS = 3;
const UPCOMING_BILL_DAYS = 7;

type Ranked = { insight: Insight; magnitude: Decimal | number; label: string };

function insight(fields: Partial<Insight> & Pick<Insight, 'id' | 'type' | 'title' | 'description' | 'severity'>): Insight {
  return {
    why: null,
    actionable: true,
    relatedCategoryId: null,
    relatedCategoryName: null,
    relatedPayee: null,
    ...fields,
  };
}

/**
 * Picks the strongest candidate: largest magnitude first, then label order
 */
function strongest(candidates: Ranked[]): Insight[] {
  const sorted = [...candidates].sort((a, b) => {
    const byMagnitude = new Decimal(b.magnitude).comparedTo(a.magnitude);
    if (byMagnitude !== 0) {
      return byMagnitude;
    }
    if (a.label === b.label) {
      return 0;
    }
    return a.label < b.label ? -1 : 1;
  });
  return sorted.slice(0, 1).map((candidate) => candidate.insight);
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

function percent(value: number): number {
  return Math.round(Math.abs(value) * 100);
}

function isStandardExpense(transaction: Transaction): boolean {
  return transaction.kind === 'standard' && transaction.isExpense;
}

function sumExpenses(transactions: Transaction[]): Decimal {
  return transactions.reduce((sum, transaction) => sum.plus(transaction.amount.abs()), ZERO);
}

function groupByPayee(transactions: Transaction[]): Map<string, Transaction[]> {
  const groups = new Map<string, Transaction[]>();
  for (const transaction of transactions) {
    const key = normalizePayeeForComparison(transaction.payee);
    const group = groups.get(key) ?? [];
    group.push(transaction);
    groups.set(key, group);
  }
  return groups;
}

function byDate(a: Transaction, b: Transaction): number {
  return a.date.getTime() - b.date.getTime();
}

/**
 * Average gap in days between consecutive dates of a date-sorted group
 */
function averageInterval(sorted: Transaction[]): number {
  return daysBetween(sorted[0].date, sorted[sorted.length - 1].date) / (sorted.length - 1);
}

function isMonthlyCadence(days: number): boolean {
  return days > MONTHLY_MIN_DAYS && days < MONTHLY_MAX_DAYS;
}

/**
 * The range a window is compared against: the previous calendar month or year
 * for whole-month or whole-year windows, otherwise the equally long range
 * just before it.
 */
export function previousComparisonRange(window: DateWindow): ComparisonRange {
  const monthStart = startOfMonth(window.start);
  if (isSame(window.start, monthStart) && isSame(window.end, endOfMonth(window.start))) {
    return { start: addMonths(monthStart, -1), end: addDays(monthStart, -1), label: 'last month' };
  }

  const yearStart = startOfYear(window.start);
  if (isSame(window.start, yearStart) && isSame(window.end, addDays(addYears(yearStart, 1), -1))) {
    return { start: addYears(yearStart, -1), end: addDays(yearStart, -1), label: 'last year' };
  }

  const days = daysInclusive(window.start, window.end);
  return { start: addDays(window.start, -days), end: addDays(window.start, -1), label: 'previous period' };
}

export function formatShortDateRange(range: DateWindow): string {
  if (isSame(range.start, range.end)) {
    return formatShortDate(range.start);
  }
  return `${formatShortDate(range.start)} to ${formatShortDate(range.end)}`;
}

function detectRecurringExpenses({ transactions }: InsightInput): Insight[] {
  const candidates: Ranked[] = [];
  for (const [key, group] of groupByPayee(transactions.filter(isStandardExpense))) {
    if (group.length < 2) {
      continue;
    }
    const sorted = [...group].sort(byDate);
    const interval = averageInterval(sorted);
    if (!isMonthlyCadence(interval)) {
      continue;
    }
    const average = sumExpenses(sorted).dividedBy(sorted.length);
    const payee = normalizePayeeDisplay(sorted[0].payee) || key;
    candidates.push({
      magnitude: average,
      label: payee,
      insight: insight({
        id: `recurring:${key}`,
        type: 'recurringExpense',
        title: `${payee} is recurring`,
        description: `About ${formatAmount(average)} monthly`,
        why: `Based on ${sorted.length} payments ~ every ${Math.round(interval)} days.`,
        severity: 'info',
        relatedPayee: payee,
      }),
    });
  }
  return strongest(candidates);
}

type CategoryBucket = { key: string; categoryId: string | null; name: string };

function bucketOf(transaction: Transaction, categoriesById: Map<string, Category>): CategoryBucket {
  const category = transaction.categoryId === null ? undefined : categoriesById.get(transaction.categoryId);
  if (!category) {
    return { key: UNCATEGORIZED, categoryId: null, name: UNCATEGORIZED };
  }
  return { key: `category:${category.id}`, categoryId: category.id, name: category.name };
}

function detectUnusualSpending(input: InsightInput, thresholds: InsightThresholds): Insight[] {
  const categoriesById = indexById(input.categories);

  const current = new Map<string, { bucket: CategoryBucket; total: Decimal }>();
  for (const transaction of input.transactions.filter(isStandardExpense)) {
    const bucket = bucketOf(transaction, categoriesById);
    const entry = current.get(bucket.key) ?? { bucket, total: ZERO };
    entry.total = entry.total.plus(transaction.amount.abs());
    current.set(bucket.key, entry);
  }

  const monthStart = startOfMonth(input.window.start);
  const historyRange = { start: addMonths(monthStart, -HISTORY_MONTHS), end: addDays(monthStart, -1) };
  const historical = new Map<string, Decimal>();
  for (const transaction of input.history) {
    if (!isStandardExpense(transaction) || !isWithinWindow(transaction.date, historyRange)) {
      continue;
    }
    const { key } = bucketOf(transaction, categoriesById);
    historical.set(key, (historical.get(key) ?? ZERO).plus(transaction.amount.abs()));
  }

  const candidates: Ranked[] = [];
  for (const { bucket, total } of current.values()) {
    const average = (historical.get(bucket.key) ?? ZERO).dividedBy(HISTORY_MONTHS);
    if (!average.greaterThan(0)) {
      continue;
    }
    const increase = total.minus(average).dividedBy(average).toNumber();
    if (increase <= thresholds.unusualSpendingIncrease) {
      continue;
    }
    candidates.push({
      magnitude: increase,
      label: bucket.name,
      insight: insight({
        id: `unusual:${bucket.key}`,
        type: 'unusualSpending',
        title: `${bucket.name} spending is high`,
        description: `${formatAmount(total)} vs ${formatAmount(average)} (up ${percent(increase)}%)`,
        why: `Compared to your average from the prior ${HISTORY_MONTHS} months.`,
        severity: 'warning',
        relatedCategoryId: bucket.categoryId,
        relatedCategoryName: bucket.name,
      }),
    });
  }
  return strongest(candidates);
}

function projectBudgetHealth({ transactions, categories, window, referenceDate }: InsightInput): Insight[] {
  const clampedToday = minDate(maxDate(referenceDate, window.start), window.end);
  const totalDays = daysInclusive(window.start, window.end);
  const daysPassed = daysInclusive(window.start, clampedToday);
  if (totalDays - daysPassed <= 0) {
    return [];
  }

  const candidates: Ranked[] = [];
  for (const category of categories) {
    if (category.groupType !== 'expense' || !category.assigned.greaterThan(0)) {
      continue;
    }
    const spent = sumExpenses(
      transactions.filter((transaction) => transaction.isExpense && transaction.categoryId === category.id),
    );
    const projected = spent.dividedBy(daysPassed).times(totalDays);
    if (!projected.greaterThan(category.assigned)) {
      continue;
    }
    candidates.push({
      magnitude: projected.minus(category.assigned),
      label: category.name,
      insight: insight({
        id: `budget:${category.id}`,
        type: 'budgetProjection',
        title: `${category.name} budget at risk`,
        description: `Projected ${formatAmount(projected)} vs budget ${formatAmount(category.assigned)}`,
        why: `Based on ${plural(daysPassed, 'day')} of spend so far.`,
        severity: 'warning',
        relatedCategoryId: category.id,
        relatedCategoryName: category.name,
      }),
    });
  }
  return strongest(candidates);
}

function identifySavingsOpportunities(input: InsightInput, thresholds: InsightThresholds): Insight[] {
  const { income, expenses, savingsRate } = input;
  const targetPercent = Math.round(thresholds.savingsTarget * 100);

  if (savingsRate !== null && income.greaterThan(0)) {
    if (savingsRate < 0) {
      return [
        insight({
          id: 'savings:over-income',
          type: 'savingsOpportunity',
          title: 'Spending over income',
          description: `${formatAmount(expenses)} expenses vs ${formatAmount(income)} income`,
          why: 'This period’s expenses exceed your income.',
          severity: 'alert',
        }),
      ];
    }
    if (savingsRate < thresholds.savingsTarget) {
      const gap = income.times(thresholds.savingsTarget).minus(income.minus(expenses));
      return [
        insight({
          id: 'savings:save-more',
          type: 'savingsOpportunity',
          title: 'Try saving a bit more',
          description: `Save ${formatAmount(gap)} more to reach ${targetPercent}%`,
          why: `Target savings is ${targetPercent}% of your income.`,
          severity: 'info',
        }),
      ];
    }
  }

  const small = input.transactions.filter(
    (transaction) => isStandardExpense(transaction) && transaction.amount.abs().lessThan(thresholds.smallPurchaseLimit),
  );
  if (small.length < thresholds.smallPurchaseMinCount) {
    return [];
  }
  return [
    insight({
      id: 'small-purchases',
      type: 'smallPurchases',
      title: 'Lots of small purchases',
      description: `${small.length} items under ${thresholds.smallPurchaseLimit} add up to ${formatAmount(sumExpenses(small))}`,
      severity: 'info',
    }),
  ];
}

function predictUpcomingBills({ history, referenceDate }: InsightInput): Insight[] {
  const candidates: Ranked[] = [];
  for (const [key, group] of groupByPayee(history.filter(isStandardExpense))) {
    if (group.length < 3) {
      continue;
    }
    const sorted = [...group].sort(byDate);
    const interval = averageInterval(sorted);
    if (!isMonthlyCadence(interval)) {
      continue;
    }
    const last = sorted[sorted.length - 1];
    const daysUntil = daysBetween(referenceDate, addDays(last.date, Math.trunc(interval)));
    if (daysUntil <= 0 || daysUntil > UPCOMING_BILL_DAYS) {
      continue;
    }
    const average = sumExpenses(sorted).dividedBy(sorted.length);
    const payee = normalizePayeeDisplay(last.payee) || key;
    candidates.push({
      magnitude: average,
      label: payee,
      insight: insight({
        id: `upcoming:${key}`,
        type: 'upcomingBill',
        title: `${payee} coming soon`,
        description: `Usually ${formatAmount(average)} in ${plural(daysUntil, 'day')}`,
        severity: 'info',
        actionable: false,
        relatedPayee: payee,
      }),
    });
  }
  return strongest(candidates);
}

function analyzeSpendingTrends(input: InsightInput, thresholds: InsightThresholds): Insight[] {
  const comparison = previousComparisonRange(input.window);
  const current = sumExpenses(input.transactions.filter(isStandardExpense));
  const previous = sumExpenses(
    input.history.filter(
      (transaction) => isStandardExpense(transaction) && isWithinWindow(transaction.date, comparison),
    ),
  );
  if (!previous.greaterThan(0)) {
    return [];
  }

  const change = current.minus(previous).dividedBy(previous).toNumber();
  if (Math.abs(change) <= thresholds.trendChange) {
    return [];
  }
  const isUp = change > 0;
  return [
    insight({
      id: 'trend:spending',
      type: 'spendingTrend',
      title: `Spending is ${isUp ? 'up' : 'down'} ${percent(change)}%`,
      description: `${formatAmount(current)} vs ${formatAmount(previous)} ${comparison.label}`,
      why: `Compared to ${comparison.label} (${formatShortDateRange(comparison)}).`,
      severity: isUp ? 'warning' : 'info',
      actionable: isUp,
    }),
  ];
}

function analyzeIncomeVariation(input: InsightInput, thresholds: InsightThresholds): Insight[] {
  const categoriesById = indexById(input.categories);
  const incomeOf = (transactions: Transaction[]) =>
    transactions
      .filter(
        (transaction) =>
          transaction.kind === 'standard' &&
          transaction.isInflow &&
          isIncomeCategorized(transaction, categoriesById),
      )
      .reduce((sum, transaction) => sum.plus(transaction.amount), ZERO);

  const comparison = previousComparisonRange(input.window);
  const current = incomeOf(input.transactions);
  const previous = incomeOf(input.history.filter((transaction) => isWithinWindow(transaction.date, comparison)));
  if (!previous.greaterThan(0) || !current.greaterThan(0)) {
    return [];
  }

  const change = current.minus(previous).dividedBy(previous).toNumber();
  const fields = {
    id: 'trend:income',
    type: 'incomeVariation' as const,
    description: `${formatAmount(current)} vs ${formatAmount(previous)} ${comparison.label}`,
    why: `Compared to ${comparison.label} (${formatShortDateRange(comparison)}).`,
  };
  if (change < -thresholds.incomeChange) {
    return [insight({ ...fields, title: `Income is down ${percent(change)}%`, severity: 'warning' })];
  }
  if (change > thresholds.incomeChange) {
    return [insight({ ...fields, title: `Income is up ${percent(change)}%`, severity: 'info', actionable: false })];
  }
  return [];
}

/**
 * Runs every insight rule in a fixed order and sorts the results by
 * severity. The sort is stable, so rule order breaks ties.
 */
export function generateInsights(input: InsightInput): Insight[] {
  const thresholds = input.thresholds ?? DEFAULT_INSIGHT_THRESHOLDS;
  const insights = [
    ...detectRecurringExpenses(input),
    ...detectUnusualSpending(input, thresholds),
    ...projectBudgetHealth(input),
    ...identifySavingsOpportunities(input, thresholds),
    ...predictUpcomingBills(input),
    ...analyzeSpendingTrends(input, thresholds),
    ...analyzeIncomeVariation(input, thresholds),
  ];
  return insights.sort((a, b) => SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity]);
}

export type InsightAction =
  | { type: 'openUncategorized' }
  | { type: 'fixBudgetCategory'; categoryId: string }
  | { type: 'showCategoryTransactions'; categoryId: string }
  | { type: 'reviewPayee'; payee: string }
  | { type: 'showIncomeExpenseDetail'; detail: 'income' | 'expenses' }
  | { type: 'showSmallPurchases'; limit: number }
  | { type: 'openReview'; section: 'expenses' }
  | { type: 'importData' };

export type InsightRow = {
  id: string;
  title: string;
  detail: string;
  why: string | null;
  severity: InsightSeverity;
  actionTitle: string | null;
  action: InsightAction | null;
};

export type InsightRowsInput = {
  insights: Insight[];
  uncategorizedCount: number;
  uncategorizedAmount: Decimal;
  savingsRate: number | null;
  income: Decimal;
  expenses: Decimal;
  expenseCategoryIds: Set<string>;
  overBudget: OverBudgetCategory[];
  budgetAssigned: Decimal;
  thresholds?: InsightThresholds;
};

function isAboutUncategorized(item: Insight): boolean {
  return item.relatedCategoryId === null || item.relatedCategoryName === UNCATEGORIZED;
}

function actionFor(item: Insight, input: InsightRowsInput, thresholds: InsightThresholds): InsightAction | null {
  switch (item.type) {
    case 'budgetProjection':
      return item.relatedCategoryId !== null && input.expenseCategoryIds.has(item.relatedCategoryId)
        ? { type: 'fixBudgetCategory', categoryId: item.relatedCategoryId }
        : null;
    case 'unusualSpending':
      if (isAboutUncategorized(item)) {
        return input.uncategorizedCount > 0 ? { type: 'openUncategorized' } : null;
      }
      return item.relatedCategoryId !== null && input.expenseCategoryIds.has(item.relatedCategoryId)
        ? { type: 'showCategoryTransactions', categoryId: item.relatedCategoryId }
        : null;
    case 'recurringExpense':
    case 'upcomingBill':
      return item.relatedPayee ? { type: 'reviewPayee', payee: item.relatedPayee } : null;
    case 'spendingTrend':
    case 'savingsOpportunity':
      return item.actionable ? { type: 'showIncomeExpenseDetail', detail: 'expenses' } : null;
    case 'smallPurchases':
      return item.actionable ? { type: 'showSmallPurchases', limit: thresholds.smallPurchaseLimit } : null;
    case 'incomeVariation':
      return item.actionable ? { type: 'showIncomeExpenseDetail', detail: 'income' } : null;
  }
}

function actionTitleFor(action: InsightAction | null, type?: InsightType): string | null {
  if (action === null) {
    return null;
  }
  switch (action.type) {
    case 'openUncategorized':
    case 'fixBudgetCategory':
      return 'Fix';
    case 'showCategoryTransactions':
    case 'reviewPayee':
      return type === 'upcomingBill' ? 'Review' : 'Fix';
    case 'showIncomeExpenseDetail':
    case 'showSmallPurchases':
    case 'openReview':
      return 'Review';
    case 'importData':
      return 'Import';
  }
}

function row(fields: Omit<InsightRow, 'actionTitle'>): InsightRow {
  return { ...fields, actionTitle: actionTitleFor(fields.action) };
}

function fallbackRows(input: InsightRowsInput, thresholds: InsightThresholds): InsightRow[] {
  const rows: InsightRow[] = [];
  const { savingsRate } = input;
  const openExpenses: InsightAction = { type: 'openReview', section: 'expenses' };
  const targetPercent = Math.round(thresholds.savingsTarget * 100);

  if (savingsRate === null) {
    rows.push(
      row({
        id: 'no_income',
        title: 'No income detected',
        detail: 'Import or add income to unlock more insights.',
        why: null,
        severity: 'info',
        action: { type: 'importData' },
      }),
    );
  } else if (savingsRate < 0) {
    rows.push(
      row({
        id: 'over_income',
        title: 'Spending over income',
        detail: `${formatAmount(input.expenses)} expenses vs ${formatAmount(input.income)} income`,
        why: 'This period’s expenses exceed your income.',
        severity: 'alert',
        action: openExpenses,
      }),
    );
  } else if (savingsRate < thresholds.savingsTarget) {
    rows.push(
      row({
        id: 'save_more',
        title: 'Try saving a bit more',
        detail: `A small cut can move your savings rate over ${targetPercent}%.`,
        why: `${targetPercent}% is a common baseline goal.`,
        severity: 'info',
        action: openExpenses,
      }),
    );
  } else {
    rows.push(
      row({
        id: 'savings_strong',
        title: 'Savings rate looks strong',
        detail: 'Keep the momentum going.',
        why: null,
        severity: 'info',
        action: null,
      }),
    );
  }

  const [topOver] = input.overBudget;
  if (topOver) {
    rows.push(
      row({
        id: 'over_budget_top',
        title: `${topOver.name} is over budget`,
        detail: `Over by ${formatAmount(topOver.overBy)}.`,
        why: 'Based on spending in this period.',
        severity: 'warning',
        action: { type: 'fixBudgetCategory', categoryId: topOver.categoryId },
      }),
    );
  } else if (input.budgetAssigned.greaterThan(0)) {
    rows.push(
      row({
        id: 'budget_on_track',
        title: 'Budget looks on track',
        detail: 'No categories are currently over budget.',
        why: null,
        severity: 'info',
        action: null,
      }),
    );
  }

  return rows;
}

/**
 * Turns engine insights into the short list shown on an overview. An
 * uncategorized-spending row always leads when such spending exists, and
 * fallback rows about savings and budgets fill an otherwise empty list.
 */
export function buildInsightRows(input: InsightRowsInput): InsightRow[] {
  const thresholds = input.thresholds ?? DEFAULT_INSIGHT_THRESHOLDS;
  const hasUncategorized = input.uncategorizedCount > 0;
  const rows: InsightRow[] = [];

  if (hasUncategorized) {
    rows.push(
      row({
        id: 'uncategorized',
        title: 'Categorize uncategorized spending',
        detail: `${plural(input.uncategorizedCount, 'transaction')} totaling ${formatAmount(input.uncategorizedAmount)}`,
        why: 'Uncategorized transactions can hide trends and reduce report accuracy.',
        severity: 'warning',
        action: { type: 'openUncategorized' },
      }),
    );
  }

  const shown = input.insights
    .filter((item) => !(hasUncategorized && item.type === 'unusualSpending' && isAboutUncategorized(item)))
    .slice(0, hasUncategorized ? thresholds.maxRows - 1 : thresholds.maxRows);
  for (const item of shown) {
    const action = actionFor(item, input, thresholds);
    rows.push({
      id: item.id,
      title: item.title,
      detail: item.description,
      why: item.why,
      severity: item.severity,
      actionTitle: actionTitleFor(action, item.type),
      action,
    });
  }

  if (rows.length === 0) {
    rows.push(...fallbackRows(input, thresholds));
  }

  return rows.slice(0, thresholds.maxRows);
}
