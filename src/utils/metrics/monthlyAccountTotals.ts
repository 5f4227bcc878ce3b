import Decimal from 'decimal.js';
import { Account } from '../../data/account/account';
import { Transaction } from '../../data/transaction/transaction';
import {
  MonthlyAccountTotal,
  accountMonthKey,
  parseAccountMonthKey,
} from '../../data/monthlyAccountTotal/monthlyAccountTotal';
import { ZERO } from '../decimal/decimal';
import { formatDate, isAfter, startOfMonth } from '../date/date';
import { indexById } from '../array/array';
import { endTiming, startTiming } from '../log';

type Aggregate = {
  accountId: string;
  monthStart: Date;
  total: Decimal;
  count: number;
};

export type AuditResult = {
  accountId: string;
  accountName: string;
  indexedTotal: Decimal;
  ledgerTotal: Decimal;
  difference: Decimal;
  balance: Decimal;
  balanceDifference: Decimal;
};

function aggregate(transactions: Transaction[], include: (key: string) => boolean = () => true) {
  const aggregates = new Map<string, Aggregate>();
  for (const transaction of transactions) {
    if (transaction.accountId === null) {
      continue;
    }
    const key = accountMonthKey(transaction.accountId, transaction.date);
    if (!include(key)) {
      continue;
    }
    const existing = aggregates.get(key);
    if (existing) {
      existing.total = existing.total.plus(transaction.amount);
      existing.count++;
    } else {
      aggregates.set(key, {
        accountId: transaction.accountId,
        monthStart: startOfMonth(transaction.date),
        total: transaction.amount,
        count: 1,
      });
    }
  }
  return aggregates;
}

function toEntry(item: Aggregate, accountsById: Map<string, Account>, computedAt: Date): MonthlyAccountTotal {
  return new MonthlyAccountTotal({
    monthStart: formatDate(item.monthStart),
    accountId: item.accountId,
    totalAmount: item.total.toFixed(),
    transactionCount: item.count,
    isTrackingOnly: accountsById.get(item.accountId)?.isTrackingOnly ?? false,
    computedAt: computedAt.toISOString(),
  });
}

function compareEntries(a: MonthlyAccountTotal, b: MonthlyAccountTotal): number {
  const byMonth = a.monthStart.getTime() - b.monthStart.getTime();
  if (byMonth !== 0) {
    return byMonth;
  }
  if (a.accountId === b.accountId) {
    return 0;
  }
  return a.accountId < b.accountId ? -1 : 1;
}

/**
 * Builds the per-account monthly totals index from scratch. Every kind of
 * transaction counts, since balances move on transfers and adjustments too.
 *
 * @param onProgress - Called once per processed transaction
 */
export function buildMonthlyAccountTotals(
  transactions: Transaction[],
  accounts: Account[],
  computedAt: Date,
  onProgress?: () => void,
): MonthlyAccountTotal[] {
  startTiming(buildMonthlyAccountTotals);
  const accountsById = indexById(accounts);
  const aggregates = aggregate(transactions, () => {
    onProgress?.();
    return true;
  });
  const result = [...aggregates.values()].map((item) => toEntry(item, accountsById, computedAt)).sort(compareEntries);
  endTiming(buildMonthlyAccountTotals);
  return result;
}

/**
 * Recomputes only the given `accountId|YYYY-MM` keys. Entries for months that
 * no longer hold transactions are dropped; malformed keys are ignored.
 */
export function applyDirtyAccountMonths(
  existing: MonthlyAccountTotal[],
  keys: Iterable<string>,
  transactions: Transaction[],
  accounts: Account[],
  computedAt: Date,
): MonthlyAccountTotal[] {
  const dirty = new Set<string>();
  for (const key of keys) {
    const parsed = parseAccountMonthKey(key);
    if (parsed) {
      dirty.add(accountMonthKey(parsed.accountId, parsed.monthStart));
    }
  }
  if (dirty.size === 0) {
    return existing;
  }

  const accountsById = indexById(accounts);
  const kept = existing.filter((entry) => !dirty.has(entry.key));
  const recomputed = [...aggregate(transactions, (key) => dirty.has(key)).values()].map((item) =>
    toEntry(item, accountsById, computedAt),
  );
  return [...kept, ...recomputed].sort(compareEntries);
}

/**
 * Checks the index for each account: the indexed totals plus transactions
 * after the last indexed month must equal both the sum of all of its
 * transactions and its live balance. Only mismatches are returned.
 *
 * `difference` is ledger total minus indexed total; `balanceDifference` is
 * live balance minus indexed total.
 */
export function auditMonthlyAccountTotals(
  monthlyTotals: MonthlyAccountTotal[],
  transactions: Transaction[],
  accounts: Account[],
): AuditResult[] {
  const results: AuditResult[] = [];
  for (const account of accounts) {
    const entries = monthlyTotals.filter((entry) => entry.accountId === account.id);
    const lastIndexed = entries.reduce<Date | null>(
      (latest, entry) => (latest === null || isAfter(entry.monthStart, latest) ? entry.monthStart : latest),
      null,
    );

    let indexedTotal = entries.reduce((sum, entry) => sum.plus(entry.totalAmount), ZERO);
    let ledgerTotal = ZERO;
    for (const transaction of transactions) {
      if (transaction.accountId !== account.id) {
        continue;
      }
      ledgerTotal = ledgerTotal.plus(transaction.amount);
      if (lastIndexed === null || isAfter(startOfMonth(transaction.date), lastIndexed)) {
        indexedTotal = indexedTotal.plus(transaction.amount);
      }
    }

    const difference = ledgerTotal.minus(indexedTotal);
    const balanceDifference = account.balance.minus(indexedTotal);
    if (!difference.isZero() || !balanceDifference.isZero()) {
      results.push({
        accountId: account.id,
        accountName: account.name,
        indexedTotal,
        ledgerTotal,
        difference,
        balance: account.balance,
        balanceDifference,
      });
    }
  }
  return results;
}
