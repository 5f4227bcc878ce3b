import { AccountData } from '../account/types';
import { CategoryGroupData } from '../category/types';
import { TransactionData } from '../transaction/types';

export type LedgerData = {
  accounts: AccountData[];
  categoryGroups: CategoryGroupData[];
  transactions: TransactionData[];
};
