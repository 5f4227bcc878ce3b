import { parse as parseSync } from 'csv-parse/sync';
import { ApiRequest } from '../../utils/net/types';
import { ApiError } from '../../utils/net/errors';
import { loadLedger, saveLedger } from '../../utils/io/ledger';
import { loadMonthlyAccountTotals, saveMonthlyAccountTotals } from '../../utils/io/monthlyAccountTotals';
import { applyDirtyAccountMonths } from '../../utils/metrics/monthlyAccountTotals';
import { accountMonthKey } from '../../data/monthlyAccountTotal/monthlyAccountTotal';
import { Transaction } from '../../data/transaction/transaction';
import { Ledger } from '../../data/ledger/ledger';
import { formatDate, parseDate } from '../../utils/date/date';
import { serializeDecimal, sumDecimals, toDecimal } from '../../utils/decimal/decimal';

export type ImportResult = {
  imported: number;
  uncategorized: number;
  balance: string;
  dirtyMonths: string[];
};

type ImportBody = {
  accountId: string;
  csv: string;
};

type CsvRow = Record<string, string>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCsvRow(value: unknown): value is CsvRow {
  return isRecord(value) && Object.values(value).every((cell) => typeof cell === 'string');
}

function getImportBody(body: unknown): ImportBody {
  if (!isRecord(body) || typeof body.accountId !== 'string' || typeof body.csv !== 'string') {
    throw new ApiError('Body must contain accountId and csv strings');
  }
  return { accountId: body.accountId, csv: body.csv };
}

/**
 * Reads `date,amount,payee[,category][,memo]` rows. Category names are
 * matched case-insensitively; unknown names import as uncategorized.
 */
function parseRows(csv: string, accountId: string, ledger: Ledger): Transaction[] {
  const records: unknown = parseSync(csv, { columns: true, skip_empty_lines: true, trim: true });
  if (!Array.isArray(records)) {
    throw new ApiError('CSV could not be read');
  }
  return records.map((record: unknown, idx: number) => {
    if (!isCsvRow(record) || !record.date || !record.amount) {
      throw new ApiError(`Row ${idx + 1} needs a date and an amount`);
    }
    const category = record.category ? ledger.findCategoryByName(record.category) : undefined;
    return new Transaction({
      date: formatDate(parseDate(record.date)),
      amount: serializeDecimal(toDecimal(record.amount)),
      payee: record.payee ?? '',
      categoryId: category?.id ?? null,
      accountId,
      memo: record.memo || null,
    });
  });
}

/**
 * Appends CSV rows to an account, moves its balance by their sum and
 * recomputes the monthly totals of every account month the rows touched.
 *
 * @example
 * ```typescript
 * // body: { accountId: 'acc-chequing', csv: 'date,amount,payee\n2024-02-01,-12.50,Kiosk' }
 * const result = importTransactions(request);
 * // result.dirtyMonths: ['acc-chequing|2024-02']
 * ```
 */
export function importTransactions(request: ApiRequest): ImportResult {
  const { accountId, csv } = getImportBody(request.body);
  const ledger = loadLedger();
  const account = ledger.getAccount(accountId);
  const rows = parseRows(csv, accountId, ledger);
  if (rows.length === 0) {
    throw new ApiError('CSV contains no rows');
  }

  const data = ledger.serialize();
  const balance = account.balance.plus(sumDecimals(rows.map((row) => row.amount)));
  const updated = new Ledger({
    ...data,
    accounts: data.accounts.map((item) =>
      item.id === accountId ? { ...item, balance: serializeDecimal(balance) } : item,
    ),
    transactions: [...data.transactions, ...rows.map((row) => row.serialize())],
  });
  saveLedger(updated);

  const dirtyMonths = [...new Set(rows.map((row) => accountMonthKey(accountId, row.date)))].sort();
  saveMonthlyAccountTotals(
    applyDirtyAccountMonths(
      loadMonthlyAccountTotals(),
      dirtyMonths,
      updated.transactions,
      updated.accounts,
      new Date(),
    ),
  );

  return {
    imported: rows.length,
    uncategorized: rows.filter((row) => row.categoryId === null).length,
    balance: serializeDecimal(balance),
    dirtyMonths,
  };
}
