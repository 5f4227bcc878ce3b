import { v4 as uuidv4 } from 'uuid';
import Decimal from 'decimal.js';
import { ACCOUNT_TYPES, AccountData, AccountType, DEBT_ACCOUNT_TYPES } from './types';
import { serializeDecimal, toDecimal } from '../../utils/decimal/decimal';

/**
 * A bank, card, loan or investment account with its live balance.
 *
 * Tracking-only accounts (memo ledgers, shared cards someone else pays) are
 * kept for reference and excluded from net worth and spending reports.
 */
export class Account {
  id: string;
  name: string;
  balance: Decimal;
  type: AccountType;
  isTrackingOnly: boolean;

  constructor(data: AccountData) {
    this.id = data.id || uuidv4();
    this.name = data.name;
    this.balance = toDecimal(data.balance);
    const type = ACCOUNT_TYPES.find((t) => t === (data.type ?? 'other'));
    if (!type) {
      throw new Error(`Invalid account type '${data.type}'`);
    }
    this.type = type;
    this.isTrackingOnly = data.isTrackingOnly || false;
  }

  /**
   * Whether the account type is debt-bearing (cards, lines of credit, loans)
   */
  get isDebt(): boolean {
    return DEBT_ACCOUNT_TYPES.includes(this.type);
  }

  serialize(): AccountData {
    return {
      id: this.id,
      name: this.name,
      balance: serializeDecimal(this.balance),
      type: this.type,
      isTrackingOnly: this.isTrackingOnly,
    };
  }
}
