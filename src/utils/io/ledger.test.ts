import { describe, it, expect, vi, beforeEach } from 'vitest';
import { loadLedger, saveLedger } from './ledger';
import { load, save } from './io';
import { createMockLedger, createMockLedgerData } from '../test/mockData';

vi.mock('./io', () => ({
  load: vi.fn(),
  save: vi.fn(),
}));

describe('ledger store', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should load the ledger from ledger.json', () => {
    vi.mocked(load).mockReturnValue(createMockLedgerData());

    const ledger = loadLedger();

    expect(load).toHaveBeenCalledWith('ledger.json');
    expect(ledger.accounts.map((account) => account.id)).toEqual(['acc-chequing', 'acc-visa']);
    expect(ledger.categories.map((category) => category.name)).toEqual(['Salary', 'Groceries', 'Gas']);
    expect(ledger.transactions).toHaveLength(3);
  });

  it('should save the serialized ledger', () => {
    const ledger = createMockLedger();

    saveLedger(ledger);

    expect(save).toHaveBeenCalledWith(ledger.serialize(), 'ledger.json');
  });
});
