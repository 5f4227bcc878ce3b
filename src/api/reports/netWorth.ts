import { ApiRequest } from '../../utils/net/types';
import {
  computeBalancesAsOf,
  computeNetWorthSeries,
  computeNetWorthSnapshot,
  NetWorthSnapshot,
} from '../../utils/metrics/netWorth';
import { formatDate, DateString } from '../../utils/date/date';
import { serializeDecimal } from '../../utils/decimal/decimal';
import { AccountType } from '../../data/account/types';
import { getReportContext, ReportContext } from './context';
import {
  SerializedNetWorthPoint,
  SerializedNetWorthSnapshot,
  serializeNetWorthPoint,
  serializeNetWorthSnapshot,
} from './serialize';

export type NetWorthAccount = {
  id: string;
  name: string;
  type: AccountType;
  isDebt: boolean;
  balance: string;
};

export type NetWorthReport = SerializedNetWorthSnapshot & {
  asOf: DateString;
  accounts: NetWorthAccount[];
};

function balancesAsOf(context: ReportContext) {
  return computeBalancesAsOf(context.accounts, context.accountTotals, context.ledgerTransactions, context.endDate);
}

/**
 * Assets, debt and net worth of the selected accounts at the end of `endDate`
 */
export function netWorthAsOf(context: ReportContext): NetWorthSnapshot {
  return computeNetWorthSnapshot(context.accounts, balancesAsOf(context));
}

/**
 * Net worth at the end of `endDate`, with the balance of every account that
 * counts towards it. Debt-bearing account types are flagged so callers can
 * list them apart.
 */
export function getNetWorth(request: ApiRequest): NetWorthReport {
  const context = getReportContext(request);
  const balances = balancesAsOf(context);
  return {
    asOf: formatDate(context.endDate),
    ...serializeNetWorthSnapshot(computeNetWorthSnapshot(context.accounts, balances)),
    accounts: context.accounts
      .filter((account) => !account.isTrackingOnly)
      .map((account) => ({
        id: account.id,
        name: account.name,
        type: account.type,
        isDebt: account.isDebt,
        balance: serializeDecimal(balances.get(account.id) ?? account.balance),
      })),
  };
}

/**
 * Month-end net worth for the last `months` months up to `endDate`
 */
export function getNetWorthSeries(request: ApiRequest): SerializedNetWorthPoint[] {
  const context = getReportContext(request);
  return computeNetWorthSeries(context.accounts, context.accountTotals, context.endDate, context.months).map(
    serializeNetWorthPoint,
  );
}
