import { ApiRequest, DefaultData, RequestData } from './types';
import { ApiError } from './errors';
import { loadLedger } from '../io/ledger';
import { loadMonthlyAccountTotals } from '../io/monthlyAccountTotals';
import { MAX_NET_WORTH_MONTHS, loadMetricsConfig } from '../config/metricsConfig';
import { endOfMonth, formatDate, isAfter, parseDate, startOfDay, startOfMonth } from '../date/date';

const POSITIVE_INTEGER = /^[1-9]\d*$/;

/**
 * Reads a single-valued query parameter. Empty values count as missing.
 * @throws ApiError if the parameter was repeated or nested
 */
function getQueryValue(request: ApiRequest, name: string): string | undefined {
  const value = request.query[name];
  if (value === undefined || value === '') {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ApiError(`Query parameter '${name}' must be a single value`);
  }
  return value;
}

function getDate(request: ApiRequest, name: string, defaultDate: Date): Date {
  const value = getQueryValue(request, name);
  return value === undefined ? defaultDate : parseDate(value);
}

/**
 * Extracts selected accounts from a comma-separated query string
 */
function getSelectedAccounts(request: ApiRequest, defaultSelectedAccounts: string[]): string[] {
  const value = getQueryValue(request, 'selectedAccounts');
  if (value === undefined) {
    return defaultSelectedAccounts;
  }
  return value
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id !== '');
}

function getMonths(request: ApiRequest, defaultMonths: number): number {
  const value = getQueryValue(request, 'months');
  if (value === undefined) {
    return defaultMonths;
  }
  const months = POSITIVE_INTEGER.test(value) ? parseInt(value, 10) : NaN;
  if (!(months <= MAX_NET_WORTH_MONTHS)) {
    throw new ApiError(`Invalid months '${value}'`);
  }
  return months;
}

/**
 * Parses the reporting query and loads the store it reports on.
 *
 * The window defaults to the calendar month containing the reference date,
 * which itself defaults to today.
 *
 * @throws ApiError if a parameter is malformed or the window is reversed
 * @throws Error if a selected account does not exist
 */
export function getData(request: ApiRequest, defaults: Partial<DefaultData> = {}): RequestData {
  const config = loadMetricsConfig();
  const referenceDate = getDate(request, 'referenceDate', defaults.defaultReferenceDate ?? startOfDay(new Date()));
  const startDate = getDate(request, 'startDate', defaults.defaultStartDate ?? startOfMonth(referenceDate));
  const endDate = getDate(request, 'endDate', defaults.defaultEndDate ?? endOfMonth(referenceDate));
  if (isAfter(startDate, endDate)) {
    throw new ApiError(`startDate ${formatDate(startDate)} is after endDate ${formatDate(endDate)}`);
  }
  const selectedAccounts = getSelectedAccounts(request, defaults.defaultSelectedAccounts ?? []);
  const months = getMonths(request, defaults.defaultMonths ?? config.netWorthMonths);

  const ledger = loadLedger();
  for (const accountId of selectedAccounts) {
    ledger.getAccount(accountId);
  }

  return {
    startDate,
    endDate,
    window: { start: startDate, end: endDate },
    referenceDate,
    selectedAccounts,
    months,
    ledger,
    monthlyTotals: loadMonthlyAccountTotals(),
    config,
  };
}
