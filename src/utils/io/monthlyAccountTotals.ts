import { checkExists, load, save } from './io';
import { MonthlyAccountTotal } from '../../data/monthlyAccountTotal/monthlyAccountTotal';
import { MonthlyAccountTotalData } from '../../data/monthlyAccountTotal/types';

const FILE_NAME = 'monthlyAccountTotals';

/**
 * Loads the per-account monthly totals index. A store that has never been
 * rebuilt has no index yet, which reads as an empty list.
 */
export function loadMonthlyAccountTotals(): MonthlyAccountTotal[] {
  if (!checkExists(`${FILE_NAME}.json`)) {
    return [];
  }
  return load<MonthlyAccountTotalData[]>(`${FILE_NAME}.json`).map((entry) => new MonthlyAccountTotal(entry));
}

export function saveMonthlyAccountTotals(totals: MonthlyAccountTotal[]) {
  save<MonthlyAccountTotalData[]>(
    totals.map((total) => total.serialize()),
    `${FILE_NAME}.json`,
  );
}
