import { load, save } from './io';
import { Ledger } from '../../data/ledger/ledger';
import { LedgerData } from '../../data/ledger/types';

const FILE_NAME = 'ledger';

/**
 * Loads accounts, category groups and transactions from ledger.json.
 *
 * @example
 * ```typescript
 * const ledger = loadLedger();
 * const checking = ledger.getAccount('acc-chequing');
 * ```
 */
export function loadLedger(): Ledger {
  return new Ledger(load<LedgerData>(`${FILE_NAME}.json`));
}

export function saveLedger(ledger: Ledger) {
  save<LedgerData>(ledger.serialize(), `${FILE_NAME}.json`);
}
