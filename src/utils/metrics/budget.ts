import Decimal from 'decimal.js';
import { Category } from '../../data/category/category';
import { Transaction } from '../../data/transaction/transaction';
import { ZERO, ratio } from '../decimal/decimal';
import { NetWorthSnapshot } from './netWorth';

export type CategoryBudget = {
  categoryId: string;
  name: string;
  assigned: Decimal;
  spent: Decimal;
  remaining: Decimal;
  utilization: number | null;
};

export type OverBudgetCategory = {
  categoryId: string;
  name: string;
  overBy: Decimal;
};

export type BudgetSummary = {
  categories: CategoryBudget[];
  assigned: Decimal;
  spent: Decimal;
  remaining: Decimal;
  // Capped at 1; null without any assigned budget
  utilization: number | null;
  overBudget: OverBudgetCategory[];
};

export type HealthScoreInput = {
  savingsRate: number | null;
  budgetUtilization: number | null;
  netWorth: NetWorthSnapshot;
  uncategorizedCount: number;
};

/**
 * Budget vs actual for every expense category, in category order. Spending is
 * counted from transactions already filtered to the reporting window.
 */
export function computeBudgetSummary(transactions: Transaction[], categories: Category[]): BudgetSummary {
  const spentByCategory = new Map<string, Decimal>();
  for (const transaction of transactions) {
    if (!transaction.isExpense || transaction.categoryId === null) {
      continue;
    }
    const spent = spentByCategory.get(transaction.categoryId) ?? ZERO;
    spentByCategory.set(transaction.categoryId, spent.plus(transaction.amount.abs()));
  }

  const expenseCategories = categories.filter((category) => category.groupType === 'expense');
  const rows = expenseCategories.map((category) => {
    const spent = spentByCategory.get(category.id) ?? ZERO;
    return {
      categoryId: category.id,
      name: category.name,
      assigned: category.assigned,
      spent,
      remaining: category.assigned.minus(spent),
      utilization: category.assigned.greaterThan(0) ? ratio(spent, category.assigned) : null,
    };
  });

  const assigned = rows.reduce((sum, row) => sum.plus(row.assigned), ZERO);
  const spent = rows.reduce((sum, row) => sum.plus(row.spent), ZERO);
  const utilization = assigned.greaterThan(0) ? ratio(spent, assigned) : null;

  const overBudget = rows
    .map((row) => ({ categoryId: row.categoryId, name: row.name, overBy: row.spent.minus(row.assigned) }))
    .filter((row) => row.overBy.greaterThan(0))
    .sort((a, b) => b.overBy.comparedTo(a.overBy));

  return {
    categories: rows,
    assigned,
    spent,
    remaining: assigned.minus(spent),
    utilization: utilization === null ? null : Math.min(1, utilization),
    overBudget,
  };
}

type Band = [bound: number, points: number];

/**
 * Points for the first band the value falls in, checked in order
 */
function bandScore(value: number, bands: Band[], otherwise: number, direction: 'atLeast' | 'atMost'): number {
  const band = bands.find(([bound]) => (direction === 'atLeast' ? value >= bound : value <= bound));
  return band ? band[1] : otherwise;
}

/**
 * Financial health score from 0 to 100, starting at 50.
 *
 * | Signal | Adjustment |
 * |---|---|
 * | savings rate ≥ 20% / ≥ 10% / ≥ 0 / < 0 | +20 / +12 / +6 / −10 |
 * | budget utilization ≤ 90% / ≤ 100% / ≤ 110% / more | +10 / +5 / −8 / −16 |
 * | debt-to-assets ≤ 30% / ≤ 60% / more | +10 / +5 / −6 |
 * | debt without assets | −8 |
 * | uncategorized spending | −5 |
 *
 * Overview callers pass the capped budget utilization, so overspending earns
 * the ≤ 100% band there.
 */
export function computeHealthScore({ savingsRate, budgetUtilization, netWorth, uncategorizedCount }: HealthScoreInput) {
  let score = 50;

  if (savingsRate !== null) {
    score += bandScore(savingsRate, [
      [0.2, 20],
      [0.1, 12],
      [0, 6],
    ], -10, 'atLeast');
  }

  if (budgetUtilization !== null) {
    score += bandScore(budgetUtilization, [
      [0.9, 10],
      [1, 5],
      [1.1, -8],
    ], -16, 'atMost');
  }

  if (netWorth.assets.greaterThan(0)) {
    const debtRatio = netWorth.debt.dividedBy(netWorth.assets).toNumber();
    score += bandScore(debtRatio, [
      [0.3, 10],
      [0.6, 5],
    ], -6, 'atMost');
  } else if (netWorth.debt.greaterThan(0)) {
    score -= 8;
  }

  if (uncategorizedCount > 0) {
    score -= 5;
  }

  return Math.max(0, Math.min(100, score));
}
