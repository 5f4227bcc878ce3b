import { v4 as uuidv4 } from 'uuid';
import Decimal from 'decimal.js';
import { TRANSACTION_KINDS, TransactionData, TransactionKind } from './types';
import { formatDate, parseDate } from '../../utils/date/date';
import { serializeDecimal, toDecimal } from '../../utils/decimal/decimal';

function parseKind(kind: string | undefined): TransactionKind {
  if (kind === undefined) {
    return 'standard';
  }
  const match = TRANSACTION_KINDS.find((k) => k === kind);
  if (!match) {
    throw new Error(`Invalid transaction kind '${kind}'`);
  }
  return match;
}

/**
 * A single ledger entry. Positive amounts are inflows, negative amounts outflows.
 */
export class Transaction {
  id: string;
  date: Date;
  amount: Decimal;
  payee: string;
  categoryId: string | null;
  accountId: string | null;
  kind: TransactionKind;
  memo: string | null;

  constructor(data: TransactionData) {
    this.id = data.id || uuidv4();
    this.date = parseDate(data.date);
    this.amount = toDecimal(data.amount);
    this.payee = data.payee ?? '';
    this.categoryId = data.categoryId || null;
    this.accountId = data.accountId || null;
    this.kind = parseKind(data.kind);
    this.memo = data.memo || null;
  }

  get isExpense(): boolean {
    return this.amount.isNegative() && !this.amount.isZero();
  }

  get isInflow(): boolean {
    return this.amount.isPositive() && !this.amount.isZero();
  }

  serialize(): TransactionData {
    return {
      id: this.id,
      date: formatDate(this.date),
      amount: serializeDecimal(this.amount),
      payee: this.payee,
      categoryId: this.categoryId,
      accountId: this.accountId,
      kind: this.kind,
      memo: this.memo,
    };
  }
}
