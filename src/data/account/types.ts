import { AmountValue } from '../../utils/decimal/decimal';

export const ACCOUNT_TYPES = [
  'chequing',
  'savings',
  'creditCard',
  'investment',
  'lineOfCredit',
  'mortgage',
  'loans',
  'other',
] as const;

export type AccountType = (typeof ACCOUNT_TYPES)[number];

// Account types whose balances are normally owed rather than owned
export const DEBT_ACCOUNT_TYPES: readonly AccountType[] = ['creditCard', 'lineOfCredit', 'mortgage', 'loans'];

export type AccountData = {
  id?: string;
  name: string;
  balance: AmountValue;
  type?: AccountType;
  isTrackingOnly?: boolean;
};
