#!/usr/bin/env node

/**
 * Rebuilds monthlyAccountTotals.json from every transaction in ledger.json.
 *
 * Run after editing ledger.json by hand. Safe to run repeatedly.
 *
 * Usage: DATA_DIR=./data npm run rebuild-totals
 */

import 'dotenv/config';
import { loadLedger } from '../src/utils/io/ledger';
import { saveMonthlyAccountTotals } from '../src/utils/io/monthlyAccountTotals';
import { buildMonthlyAccountTotals } from '../src/utils/metrics/monthlyAccountTotals';
import { incrementProgressBar, initProgressBar, stopProgressBar } from '../src/utils/log';

export function rebuildFromLedger(computedAt: Date = new Date()): number {
  const ledger = loadLedger();
  initProgressBar(ledger.transactions.length);
  try {
    const totals = buildMonthlyAccountTotals(ledger.transactions, ledger.accounts, computedAt, incrementProgressBar);
    saveMonthlyAccountTotals(totals);
    return totals.length;
  } finally {
    stopProgressBar();
  }
}

if (require.main === module) {
  const entries = rebuildFromLedger();
  console.log(`Wrote ${entries} monthly account totals`);
}
