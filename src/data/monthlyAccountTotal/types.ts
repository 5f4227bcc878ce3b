import { AmountValue } from '../../utils/decimal/decimal';
import { DateString } from '../../utils/date/date';

export type MonthlyAccountTotalData = {
  monthStart: DateString;
  accountId: string;
  totalAmount: AmountValue;
  transactionCount: number;
  isTrackingOnly: boolean;
  computedAt: string;
};
