import Decimal from 'decimal.js';
import { DEFAULT_VELOCITY_THRESHOLDS, VelocityThresholds } from '../config/metricsConfig';
import { ZERO } from '../decimal/decimal';
import { daysBetween, daysInclusive, isBefore, minDate } from '../date/date';

export type VelocityStatus =
  | 'under-pace'
  | 'on-pace'
  | 'slightly-over'
  | 'over-pace'
  | 'no-budget'
  | 'no-spending'
  | 'insufficient-data';

export type VelocityInput = {
  periodStart: Date;
  periodEnd: Date;
  referenceDate: Date;
  spent: Decimal;
  assigned: Decimal;
};

export type SpendingVelocity = {
  periodStart: Date;
  periodEnd: Date;
  daysInPeriod: number;
  daysElapsed: number;
  daysRemaining: number;
  spent: Decimal;
  assigned: Decimal;
  dailyRate: Decimal;
  targetDailyRate: Decimal;
  ratio: number;
  projectedSpent: Decimal;
  projectedRemaining: Decimal;
  projectedOverBudget: Decimal;
  status: VelocityStatus;
  isUsable: boolean;
  isPeriodComplete: boolean;
  periodProgress: number;
};

/**
 * Maps a pace ratio onto a status. Each upper bound is inclusive except the
 * under-pace one, so exactly 0.85 is on pace.
 */
export function classifyVelocityRatio(
  ratio: number,
  thresholds: VelocityThresholds = DEFAULT_VELOCITY_THRESHOLDS,
): VelocityStatus {
  if (ratio < thresholds.underPace) {
    return 'under-pace';
  }
  if (ratio <= thresholds.onPace) {
    return 'on-pace';
  }
  if (ratio <= thresholds.slightlyOver) {
    return 'slightly-over';
  }
  return 'over-pace';
}

function elapsedDays(input: VelocityInput, daysInPeriod: number): number {
  if (isBefore(input.referenceDate, input.periodStart)) {
    return 0;
  }
  const effectiveToday = minDate(input.referenceDate, input.periodEnd);
  return Math.min(daysInPeriod, Math.max(1, daysBetween(input.periodStart, effectiveToday) + 1));
}

/**
 * Projects period-end spending from the pace so far.
 *
 * A budget that has not started yet reports `insufficient-data`; a missing
 * budget wins over every other status.
 *
 * @example
 * ```typescript
 * const velocity = computeSpendingVelocity({
 *   periodStart: parseDate('2024-01-01'),
 *   periodEnd: parseDate('2024-01-31'),
 *   referenceDate: parseDate('2024-01-10'),
 *   spent: new Decimal(200),
 *   assigned: new Decimal(310),
 * });
 * velocity.dailyRate; // 20
 * velocity.status; // 'over-pace'
 * ```
 */
export function computeSpendingVelocity(
  input: VelocityInput,
  thresholds: VelocityThresholds = DEFAULT_VELOCITY_THRESHOLDS,
): SpendingVelocity {
  const daysInPeriod = daysInclusive(input.periodStart, input.periodEnd);
  const daysElapsed = elapsedDays(input, daysInPeriod);
  const daysRemaining = Math.max(0, daysInPeriod - daysElapsed);

  const dailyRate = daysElapsed > 0 ? input.spent.dividedBy(daysElapsed) : ZERO;
  const targetDailyRate = input.assigned.greaterThan(0) ? input.assigned.dividedBy(daysInPeriod) : ZERO;
  const ratio = targetDailyRate.greaterThan(0) ? dailyRate.dividedBy(targetDailyRate).toNumber() : 1;

  const projectedSpent = dailyRate.times(daysInPeriod);
  const projectedRemaining = input.assigned.minus(projectedSpent);
  const projectedOverBudget = Decimal.max(ZERO, projectedSpent.minus(input.assigned));

  let status: VelocityStatus;
  if (!input.assigned.greaterThan(0)) {
    status = 'no-budget';
  } else if (daysElapsed === 0) {
    status = 'insufficient-data';
  } else if (!input.spent.greaterThan(0)) {
    status = 'no-spending';
  } else {
    status = classifyVelocityRatio(ratio, thresholds);
  }

  return {
    periodStart: input.periodStart,
    periodEnd: input.periodEnd,
    daysInPeriod,
    daysElapsed,
    daysRemaining,
    spent: input.spent,
    assigned: input.assigned,
    dailyRate,
    targetDailyRate,
    ratio,
    projectedSpent,
    projectedRemaining,
    projectedOverBudget,
    status,
    isUsable: daysElapsed > 0 && input.assigned.greaterThan(0),
    isPeriodComplete: daysRemaining === 0,
    periodProgress: daysElapsed / daysInPeriod,
  };
}
