import { Account } from '../../data/account/account';
import { Transaction } from '../../data/transaction/transaction';
import { MonthlyAccountTotal } from '../../data/monthlyAccountTotal/monthlyAccountTotal';
import { getData } from '../../utils/net/request';
import { ApiRequest, DefaultData, RequestData } from '../../utils/net/types';
import { filterByWindow, reportableTransactions } from '../../utils/metrics/totals';

export type ReportContext = RequestData & {
  // Selected accounts, or every account when none are selected
  accounts: Account[];
  // Every transaction of the selected accounts, any kind
  ledgerTransactions: Transaction[];
  // Reportable transactions across all history
  history: Transaction[];
  // Reportable transactions inside the window
  transactions: Transaction[];
  accountTotals: MonthlyAccountTotal[];
};

/**
 * Loads request data and narrows it to the selected accounts. Transactions
 * without an account only appear when no selection is made.
 */
export function getReportContext(request: ApiRequest, defaults: Partial<DefaultData> = {}): ReportContext {
  const data = getData(request, defaults);
  const selected = new Set(data.selectedAccounts);
  const isSelected = (accountId: string | null) =>
    selected.size === 0 || (accountId !== null && selected.has(accountId));

  const accounts = data.ledger.accounts.filter((account) => isSelected(account.id));
  const ledgerTransactions = data.ledger.transactions.filter((transaction) => isSelected(transaction.accountId));
  const history = reportableTransactions(ledgerTransactions, accounts);

  return {
    ...data,
    accounts,
    ledgerTransactions,
    history,
    transactions: filterByWindow(history, data.window),
    accountTotals: data.monthlyTotals.filter((entry) => isSelected(entry.accountId)),
  };
}
