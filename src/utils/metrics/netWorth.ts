import Decimal from 'decimal.js';
import { Account } from '../../data/account/account';
import { MonthlyAccountTotal } from '../../data/monthlyAccountTotal/monthlyAccountTotal';
import { Transaction } from '../../data/transaction/transaction';
import { ZERO } from '../decimal/decimal';
import { MAX_NET_WORTH_MONTHS } from '../config/metricsConfig';
import { addMonths, endOfMonth, isAfter, isBeforeOrSame, monthsBetween, startOfMonth } from '../date/date';

export type NetWorthSnapshot = {
  assets: Decimal;
  debt: Decimal;
  netWorth: Decimal;
};

export type NetWorthPoint = NetWorthSnapshot & {
  monthStart: Date;
};

type Accumulator = { assets: Decimal; debt: Decimal };

function addBalance(accumulator: Accumulator, balance: Decimal) {
  if (balance.isPositive()) {
    accumulator.assets = accumulator.assets.plus(balance);
  } else {
    accumulator.debt = accumulator.debt.plus(balance.abs());
  }
}

function toSnapshot({ assets, debt }: Accumulator): NetWorthSnapshot {
  return { assets, debt, netWorth: assets.minus(debt) };
}

/**
 * Splits balances of the accounts that count towards net worth into assets
 * and debt. Balances default to each account's live balance.
 */
export function computeNetWorthSnapshot(accounts: Account[], balances?: Map<string, Decimal>): NetWorthSnapshot {
  const accumulator: Accumulator = { assets: ZERO, debt: ZERO };
  for (const account of accounts) {
    if (account.isTrackingOnly) {
      continue;
    }
    addBalance(accumulator, balances?.get(account.id) ?? account.balance);
  }
  return toSnapshot(accumulator);
}

/**
 * Rebuilds each account's balance at the end of `asOf` by backing out
 * everything booked after that day from its live balance.
 *
 * Whole months after `asOf` come from the monthly totals index; the rest of
 * the month containing `asOf` comes from the transactions themselves.
 */
export function computeBalancesAsOf(
  accounts: Account[],
  monthlyTotals: MonthlyAccountTotal[],
  transactions: Transaction[],
  asOf: Date,
): Map<string, Decimal> {
  const asOfMonth = startOfMonth(asOf);
  const monthEnd = endOfMonth(asOf);
  const after = new Map<string, Decimal>();
  const addAfter = (accountId: string, amount: Decimal) => {
    after.set(accountId, (after.get(accountId) ?? ZERO).plus(amount));
  };

  for (const entry of monthlyTotals) {
    if (isAfter(entry.monthStart, asOfMonth)) {
      addAfter(entry.accountId, entry.totalAmount);
    }
  }
  for (const transaction of transactions) {
    if (
      transaction.accountId !== null &&
      isAfter(transaction.date, asOf) &&
      isBeforeOrSame(transaction.date, monthEnd)
    ) {
      addAfter(transaction.accountId, transaction.amount);
    }
  }

  const balances = new Map<string, Decimal>();
  for (const account of accounts) {
    balances.set(account.id, account.balance.minus(after.get(account.id) ?? ZERO));
  }
  return balances;
}

/**
 * Month-end net worth for up to `maxMonths` months (never more than 12) ending
 * with the month that contains `endDate`.
 *
 * The series never reaches back before the earliest indexed month. Each
 * account is walked from its live balance backwards: a month's closing balance
 * is the live balance minus every monthly total after that month.
 */
export function computeNetWorthSeries(
  accounts: Account[],
  monthlyTotals: MonthlyAccountTotal[],
  endDate: Date,
  maxMonths = MAX_NET_WORTH_MONTHS,
): NetWorthPoint[] {
  const lastMonth = startOfMonth(endDate);
  const earliest = monthlyTotals.reduce<Date>(
    (min, entry) => (entry.monthStart.getTime() < min.getTime() ? entry.monthStart : min),
    lastMonth,
  );
  const monthsAvailable = Math.max(1, monthsBetween(earliest, lastMonth) + 1);
  const monthsToShow = Math.max(1, Math.min(maxMonths, MAX_NET_WORTH_MONTHS, monthsAvailable));
  const firstMonth = addMonths(lastMonth, -(monthsToShow - 1));
  const months = Array.from({ length: monthsToShow }, (_, offset) => addMonths(firstMonth, offset));

  const totalsByAccount = new Map<string, Map<number, Decimal>>();
  const afterLastShown = new Map<string, Decimal>();
  for (const entry of monthlyTotals) {
    if (isAfter(entry.monthStart, lastMonth)) {
      afterLastShown.set(entry.accountId, (afterLastShown.get(entry.accountId) ?? ZERO).plus(entry.totalAmount));
      continue;
    }
    const byMonth = totalsByAccount.get(entry.accountId) ?? new Map<number, Decimal>();
    const key = entry.monthStart.getTime();
    byMonth.set(key, (byMonth.get(key) ?? ZERO).plus(entry.totalAmount));
    totalsByAccount.set(entry.accountId, byMonth);
  }

  const accumulators: Accumulator[] = months.map(() => ({ assets: ZERO, debt: ZERO }));
  for (const account of accounts) {
    if (account.isTrackingOnly) {
      continue;
    }
    const byMonth = totalsByAccount.get(account.id);
    let runningAfter = afterLastShown.get(account.id) ?? ZERO;
    for (let i = months.length - 1; i >= 0; i--) {
      addBalance(accumulators[i], account.balance.minus(runningAfter));
      runningAfter = runningAfter.plus(byMonth?.get(months[i].getTime()) ?? ZERO);
    }
  }

  return months.map((monthStart, i) => ({ monthStart, ...toSnapshot(accumulators[i]) }));
}
