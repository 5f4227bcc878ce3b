import Decimal from 'decimal.js';
import { Transaction } from '../../data/transaction/transaction';
import { Account } from '../../data/account/account';
import { Category, UNCATEGORIZED } from '../../data/category/category';
import { ZERO, ratio } from '../decimal/decimal';
import { DateWindow, daysInclusive, isWithinWindow } from '../date/date';
import { normalizePayeeDisplay, normalizePayeeForComparison } from '../payee/payee';
import { indexById } from '../array/array';

/**
 * One labelled group of a breakdown, with the absolute amount and number of
 * transactions that fell into it
 */
export type BreakdownEntry = {
  key: string;
  label: string;
  amount: Decimal;
  count: number;
};

export type Totals = {
  inflow: Decimal;
  outflow: Decimal;
  netChange: Decimal;
  transactionCount: number;
  byCategory: BreakdownEntry[];
  byPayee: BreakdownEntry[];
};

export type Cashflow = {
  income: Decimal;
  expenses: Decimal;
  netChange: Decimal;
  savingsRate: number | null;
  averageDailySpend: Decimal;
  averageDailyIncome: Decimal;
  days: number;
};

/**
 * Keeps the transactions that belong in spending reports: standard entries
 * whose account is not tracking-only. Transactions without an account are kept.
 */
export function reportableTransactions(transactions: Transaction[], accounts: Account[]): Transaction[] {
  const trackingOnly = new Set(accounts.filter((account) => account.isTrackingOnly).map((account) => account.id));
  return transactions.filter(
    (transaction) =>
      transaction.kind === 'standard' && !(transaction.accountId !== null && trackingOnly.has(transaction.accountId)),
  );
}

export function filterByWindow(transactions: Transaction[], window: DateWindow): Transaction[] {
  return transactions.filter((transaction) => isWithinWindow(transaction.date, window));
}

/**
 * Accumulates amounts per key and orders the groups by descending amount.
 * Ties fall back to label order, then to the order keys were first seen.
 */
export function groupAmounts<T>(
  items: T[],
  groupOf: (item: T) => { key: string; label: string },
  amountOf: (item: T) => Decimal,
): BreakdownEntry[] {
  const groups = new Map<string, BreakdownEntry>();
  for (const item of items) {
    const { key, label } = groupOf(item);
    const existing = groups.get(key);
    if (existing) {
      existing.amount = existing.amount.plus(amountOf(item));
      existing.count++;
    } else {
      groups.set(key, { key, label, amount: amountOf(item), count: 1 });
    }
  }
  return [...groups.values()].sort((a, b) => {
    const byAmount = b.amount.comparedTo(a.amount);
    if (byAmount !== 0) {
      return byAmount;
    }
    if (a.label === b.label) {
      return 0;
    }
    return a.label < b.label ? -1 : 1;
  });
}

/**
 * Name of the transaction's category, or "Uncategorized" when it has none or
 * references a category that no longer exists
 */
export function categoryLabel(transaction: Transaction, categoriesById: Map<string, Category>): string {
  if (transaction.categoryId === null) {
    return UNCATEGORIZED;
  }
  return categoriesById.get(transaction.categoryId)?.name ?? UNCATEGORIZED;
}

export function isUncategorized(transaction: Transaction, categoriesById: Map<string, Category>): boolean {
  return transaction.categoryId === null || !categoriesById.has(transaction.categoryId);
}

/**
 * Spending per category name, as absolute amounts
 */
export function expensesByCategory(transactions: Transaction[], categories: Category[]): BreakdownEntry[] {
  const categoriesById = indexById(categories);
  return groupAmounts(
    transactions.filter((transaction) => transaction.isExpense),
    (transaction) => {
      const label = categoryLabel(transaction, categoriesById);
      return { key: label, label };
    },
    (transaction) => transaction.amount.abs(),
  );
}

/**
 * Inflows per category name
 */
export function incomeByCategory(transactions: Transaction[], categories: Category[]): BreakdownEntry[] {
  const categoriesById = indexById(categories);
  return groupAmounts(
    transactions.filter((transaction) => transaction.isInflow),
    (transaction) => {
      const label = categoryLabel(transaction, categoriesById);
      return { key: label, label };
    },
    (transaction) => transaction.amount,
  );
}

/**
 * Spending per payee. Payees are grouped on their comparison form and labelled
 * with the first display form seen.
 */
export function expensesByPayee(transactions: Transaction[]): BreakdownEntry[] {
  return groupAmounts(
    transactions.filter((transaction) => transaction.isExpense),
    (transaction) => ({
      key: normalizePayeeForComparison(transaction.payee),
      label: normalizePayeeDisplay(transaction.payee),
    }),
    (transaction) => transaction.amount.abs(),
  );
}

/**
 * Totals and breakdowns for transactions already filtered to a date window.
 * Empty input yields zero totals and empty groups.
 *
 * @example
 * ```typescript
 * const totals = computeTotals(transactions, ledger.categories);
 * totals.inflow.minus(totals.outflow).equals(totals.netChange); // always true
 * ```
 */
export function computeTotals(transactions: Transaction[], categories: Category[]): Totals {
  let inflow = ZERO;
  let outflow = ZERO;
  for (const transaction of transactions) {
    if (transaction.isInflow) {
      inflow = inflow.plus(transaction.amount);
    } else if (transaction.isExpense) {
      outflow = outflow.plus(transaction.amount.abs());
    }
  }

  return {
    inflow,
    outflow,
    netChange: inflow.minus(outflow),
    transactionCount: transactions.length,
    byCategory: expensesByCategory(transactions, categories),
    byPayee: expensesByPayee(transactions),
  };
}

/**
 * Income and spending for a window. Only inflows categorized under an income
 * group count as income, so refunds and transfers in do not inflate it.
 */
export function computeCashflow(transactions: Transaction[], categories: Category[], window: DateWindow): Cashflow {
  const categoriesById = indexById(categories);
  let income = ZERO;
  let expenses = ZERO;
  for (const transaction of transactions) {
    if (transaction.isInflow && isIncomeCategorized(transaction, categoriesById)) {
      income = income.plus(transaction.amount);
    } else if (transaction.isExpense) {
      expenses = expenses.plus(transaction.amount.abs());
    }
  }

  const netChange = income.minus(expenses);
  const days = daysInclusive(window.start, window.end);
  const hasTransactions = transactions.length > 0;

  return {
    income,
    expenses,
    netChange,
    savingsRate: income.greaterThan(0) ? ratio(netChange, income) : null,
    averageDailySpend: hasTransactions ? expenses.dividedBy(days) : ZERO,
    averageDailyIncome: hasTransactions ? income.dividedBy(days) : ZERO,
    days,
  };
}

export function isIncomeCategorized(transaction: Transaction, categoriesById: Map<string, Category>): boolean {
  if (transaction.categoryId === null) {
    return false;
  }
  return categoriesById.get(transaction.categoryId)?.groupType === 'income';
}

/**
 * The most negative transaction, or null when nothing was spent
 */
export function largestExpense(transactions: Transaction[]): Transaction | null {
  let largest: Transaction | null = null;
  for (const transaction of transactions) {
    if (transaction.isExpense && (largest === null || transaction.amount.lessThan(largest.amount))) {
      largest = transaction;
    }
  }
  return largest;
}

/**
 * The largest income-categorized inflow, or null when there is none
 */
export function largestIncome(transactions: Transaction[], categories: Category[]): Transaction | null {
  const categoriesById = indexById(categories);
  let largest: Transaction | null = null;
  for (const transaction of transactions) {
    if (!transaction.isInflow || !isIncomeCategorized(transaction, categoriesById)) {
      continue;
    }
    if (largest === null || transaction.amount.greaterThan(largest.amount)) {
      largest = transaction;
    }
  }
  return largest;
}
