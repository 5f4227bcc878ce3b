import { Request } from 'express';
import { Ledger } from '../../data/ledger/ledger';
import { MonthlyAccountTotal } from '../../data/monthlyAccountTotal/monthlyAccountTotal';
import { MetricsConfig } from '../config/metricsConfig';
import { DateWindow } from '../date/date';

/**
 * The parts of an express request the handlers read
 */
export type ApiRequest = Pick<Request, 'query' | 'body' | 'headers'>;

export type DefaultData = {
  defaultStartDate: Date;
  defaultEndDate: Date;
  defaultReferenceDate: Date;
  defaultSelectedAccounts: string[];
  defaultMonths: number;
};

export type RequestData = {
  startDate: Date;
  endDate: Date;
  window: DateWindow;
  referenceDate: Date;
  selectedAccounts: string[];
  months: number;
  ledger: Ledger;
  monthlyTotals: MonthlyAccountTotal[];
  config: MetricsConfig;
};
