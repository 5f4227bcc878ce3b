import { ApiRequest } from '../../utils/net/types';
import { loadLedger } from '../../utils/io/ledger';
import { loadMonthlyAccountTotals, saveMonthlyAccountTotals } from '../../utils/io/monthlyAccountTotals';
import { auditMonthlyAccountTotals, buildMonthlyAccountTotals } from '../../utils/metrics/monthlyAccountTotals';
import { serializeDecimal } from '../../utils/decimal/decimal';

export type SerializedAuditResult = {
  accountId: string;
  accountName: string;
  indexedTotal: string;
  ledgerTotal: string;
  difference: string;
  balance: string;
  balanceDifference: string;
};

/**
 * Rebuilds the monthly account totals index from the whole ledger
 */
export function rebuildMonthlyTotals(_request: ApiRequest): { entries: number; computedAt: string } {
  const ledger = loadLedger();
  const computedAt = new Date();
  const totals = buildMonthlyAccountTotals(ledger.transactions, ledger.accounts, computedAt);
  saveMonthlyAccountTotals(totals);
  return { entries: totals.length, computedAt: computedAt.toISOString() };
}

/**
 * Accounts whose indexed totals no longer agree with their transactions or
 * their live balance
 */
export function auditMonthlyTotals(_request: ApiRequest): SerializedAuditResult[] {
  const ledger = loadLedger();
  return auditMonthlyAccountTotals(loadMonthlyAccountTotals(), ledger.transactions, ledger.accounts).map(
    (result) => ({
      accountId: result.accountId,
      accountName: result.accountName,
      indexedTotal: serializeDecimal(result.indexedTotal),
      ledgerTotal: serializeDecimal(result.ledgerTotal),
      difference: serializeDecimal(result.difference),
      balance: serializeDecimal(result.balance),
      balanceDifference: serializeDecimal(result.balanceDifference),
    }),
  );
}
