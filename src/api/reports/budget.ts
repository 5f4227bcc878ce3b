import { ApiRequest } from '../../utils/net/types';
import { computeBudgetSummary } from '../../utils/metrics/budget';
import { getReportContext } from './context';
import { SerializedBudgetSummary, serializeBudgetSummary } from './serialize';

export function getBudget(request: ApiRequest): SerializedBudgetSummary {
  const context = getReportContext(request);
  return serializeBudgetSummary(computeBudgetSummary(context.transactions, context.ledger.categories));
}
