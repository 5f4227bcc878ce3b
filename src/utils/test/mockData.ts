import { Transaction } from '../../data/transaction/transaction';
import { TransactionData } from '../../data/transaction/types';
import { Ledger } from '../../data/ledger/ledger';
import { LedgerData } from '../../data/ledger/types';
import { ApiRequest, RequestData } from '../net/types';
import { parseDate } from '../date/date';
import { DEFAULT_METRICS_CONFIG } from '../config/metricsConfig';
import { buildMonthlyAccountTotals } from '../metrics/monthlyAccountTotals';

/**
 * Creates a request carrying only what the handlers read
 */
export function createMockRequest(overrides: Partial<ApiRequest> = {}): ApiRequest {
  return {
    query: {},
    body: {},
    headers: {},
    ...overrides,
  };
}

let transactionCounter = 0;

/**
 * Creates a standard transaction with a generated id
 */
export function makeTransaction(data: Partial<TransactionData> & Pick<TransactionData, 'date' | 'amount'>): Transaction {
  transactionCounter++;
  return new Transaction({
    id: `tx-${transactionCounter}`,
    payee: 'Test Payee',
    ...data,
  });
}

/**
 * One month of activity: a paycheque, groceries against a 300 budget and gas
 * on a credit card
 */
export function createMockLedgerData(overrides: Partial<LedgerData> = {}): LedgerData {
  return {
    accounts: [
      { id: 'acc-chequing', name: 'Chequing', balance: '800', type: 'chequing' },
      { id: 'acc-visa', name: 'Visa', balance: '-50', type: 'creditCard' },
    ],
    categoryGroups: [
      {
        id: 'grp-income',
        name: 'Income',
        type: 'income',
        order: 0,
        categories: [{ id: 'cat-salary', name: 'Salary', order: 0 }],
      },
      {
        id: 'grp-everyday',
        name: 'Everyday',
        type: 'expense',
        order: 1,
        categories: [
          { id: 'cat-groceries', name: 'Groceries', assigned: '300', order: 0 },
          { id: 'cat-gas', name: 'Gas', assigned: '0', order: 1 },
        ],
      },
    ],
    transactions: [
      {
        id: 'tx-pay',
        date: '2024-01-01',
        amount: '1000',
        payee: 'ACME PAYROLL',
        categoryId: 'cat-salary',
        accountId: 'acc-chequing',
      },
      {
        id: 'tx-groceries',
        date: '2024-01-10',
        amount: '-200',
        payee: 'POS FRESH MART',
        categoryId: 'cat-groceries',
        accountId: 'acc-chequing',
      },
      {
        id: 'tx-gas',
        date: '2024-01-15',
        amount: '-50',
        payee: 'Shell',
        categoryId: 'cat-gas',
        accountId: 'acc-visa',
      },
    ],
    ...overrides,
  };
}

export function createMockLedger(overrides: Partial<LedgerData> = {}): Ledger {
  return new Ledger(createMockLedgerData(overrides));
}

/**
 * Request data for January 2024 as seen on the 20th, with a monthly totals
 * index built from the ledger
 */
export function createMockRequestData(overrides: Partial<RequestData> = {}): RequestData {
  const ledger = overrides.ledger ?? createMockLedger();
  const startDate = overrides.startDate ?? parseDate('2024-01-01');
  const endDate = overrides.endDate ?? parseDate('2024-01-31');
  return {
    startDate,
    endDate,
    window: { start: startDate, end: endDate },
    referenceDate: parseDate('2024-01-20'),
    selectedAccounts: [],
    months: 12,
    ledger,
    monthlyTotals: buildMonthlyAccountTotals(
      ledger.transactions,
      ledger.accounts,
      new Date('2024-02-01T00:00:00.000Z'),
    ),
    config: DEFAULT_METRICS_CONFIG,
    ...overrides,
  };
}
