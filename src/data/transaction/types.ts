import { AmountValue } from '../../utils/decimal/decimal';
import { DateString } from '../../utils/date/date';

export const TRANSACTION_KINDS = ['standard', 'transfer', 'adjustment', 'ignored'] as const;

/**
 * `standard` rows are ordinary income and spending; the other kinds move money
 * between accounts or correct balances and stay out of spending reports
 */
export type TransactionKind = (typeof TRANSACTION_KINDS)[number];

export type TransactionData = {
  id?: string;
  date: DateString;
  amount: AmountValue;
  payee: string;
  categoryId?: string | null;
  accountId?: string | null;
  kind?: TransactionKind;
  memo?: string | null;
};
