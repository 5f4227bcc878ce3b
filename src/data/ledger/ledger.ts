import { Account } from '../account/account';
import { Category, CategoryGroup } from '../category/category';
import { Transaction } from '../transaction/transaction';
import { LedgerData } from './types';
import { getById } from '../../utils/array/array';

/**
 * Read-only snapshot of everything the metrics are computed from
 */
export class Ledger {
  accounts: Account[];
  categoryGroups: CategoryGroup[];
  categories: Category[];
  transactions: Transaction[];

  constructor(data: LedgerData) {
    this.accounts = (data.accounts ?? []).map((account) => new Account(account));
    this.categoryGroups = (data.categoryGroups ?? [])
      .map((group) => new CategoryGroup(group))
      .sort((a, b) => a.order - b.order);
    this.categories = this.categoryGroups.flatMap((group) => group.categories);
    this.transactions = (data.transactions ?? [])
      .map((transaction) => new Transaction(transaction))
      .sort((a, b) => a.date.getTime() - b.date.getTime());
  }

  getAccount(id: string): Account {
    return getById<Account>(this.accounts, id);
  }

  /**
   * Case-insensitive lookup used when importing rows that name their category
   */
  findCategoryByName(name: string): Category | undefined {
    const needle = name.trim().toLowerCase();
    return this.categories.find((category) => category.name.toLowerCase() === needle);
  }

  serialize(): LedgerData {
    return {
      accounts: this.accounts.map((account) => account.serialize()),
      categoryGroups: this.categoryGroups.map((group) => group.serialize()),
      transactions: this.transactions.map((transaction) => transaction.serialize()),
    };
  }
}
