import Decimal from 'decimal.js';
import { MonthlyAccountTotalData } from './types';
import { formatDate, monthKey, parseDate, startOfMonth } from '../../utils/date/date';
import { serializeDecimal, toDecimal } from '../../utils/decimal/decimal';

/**
 * Precomputed net sum of one account's transactions within one calendar month.
 * Lets historical balances be rebuilt without rescanning every transaction.
 */
export class MonthlyAccountTotal {
  monthStart: Date;
  accountId: string;
  totalAmount: Decimal;
  transactionCount: number;
  isTrackingOnly: boolean;
  computedAt: Date;

  constructor(data: MonthlyAccountTotalData) {
    this.monthStart = startOfMonth(parseDate(data.monthStart));
    this.accountId = data.accountId;
    this.totalAmount = toDecimal(data.totalAmount);
    this.transactionCount = data.transactionCount;
    this.isTrackingOnly = data.isTrackingOnly;
    const computedAt = new Date(data.computedAt);
    if (isNaN(computedAt.getTime())) {
      throw new Error(`Invalid date '${data.computedAt}'`);
    }
    this.computedAt = computedAt;
  }

  /**
   * Identifies the entry as `accountId|YYYY-MM`
   */
  get key(): string {
    return accountMonthKey(this.accountId, this.monthStart);
  }

  serialize(): MonthlyAccountTotalData {
    return {
      monthStart: formatDate(this.monthStart),
      accountId: this.accountId,
      totalAmount: serializeDecimal(this.totalAmount),
      transactionCount: this.transactionCount,
      isTrackingOnly: this.isTrackingOnly,
      computedAt: this.computedAt.toISOString(),
    };
  }
}

export function accountMonthKey(accountId: string, date: Date): string {
  return `${accountId}|${monthKey(date)}`;
}

/**
 * Splits an `accountId|YYYY-MM` key, returning null for malformed keys
 */
export function parseAccountMonthKey(key: string): { accountId: string; monthStart: Date } | null {
  const separator = key.lastIndexOf('|');
  if (separator <= 0) {
    return null;
  }
  const accountId = key.slice(0, separator);
  const month = key.slice(separator + 1);
  if (!/^\d{4}-\d{2}$/.test(month)) {
    return null;
  }
  try {
    return { accountId, monthStart: parseDate(`${month}-01`) };
  } catch {
    return null;
  }
}
