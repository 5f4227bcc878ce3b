import Decimal from 'decimal.js';

// Currency math runs on decimal.js so sums of cents never pick up binary-float error
Decimal.set({ precision: 20, rounding: Decimal.ROUND_HALF_UP });

export const ZERO = new Decimal(0);

/**
 * Raw amount as it appears in stored data: decimal strings are preferred,
 * plain JSON numbers are accepted for hand-written files.
 */
export type AmountValue = string | number;

/**
 * Converts a stored amount into a Decimal
 * @param value - Decimal string or number
 * @returns The parsed Decimal
 * @throws Error if the value is not a finite number
 */
export function toDecimal(value: AmountValue | Decimal): Decimal {
  if (Decimal.isDecimal(value)) {
    return value;
  }
  let parsed: Decimal;
  try {
    parsed = new Decimal(typeof value === 'string' ? value.trim() : value);
  } catch {
    throw new Error(`Invalid amount '${value}'`);
  }
  if (!parsed.isFinite()) {
    throw new Error(`Invalid amount '${value}'`);
  }
  return parsed;
}

/**
 * Sums a list of decimals, returning zero for an empty list
 */
export function sumDecimals(values: Decimal[]): Decimal {
  return values.reduce((total, value) => total.plus(value), ZERO);
}

/**
 * Exact, non-exponential string form used in API responses and store files
 */
export function serializeDecimal(value: Decimal): string {
  return value.toFixed();
}

/**
 * Two-decimal text used inside insight sentences
 */
export function formatAmount(value: Decimal): string {
  return value.toFixed(2);
}

/**
 * Divides two decimals and returns a plain number, or null when the divisor is zero
 */
export function ratio(numerator: Decimal, denominator: Decimal): number | null {
  if (denominator.isZero()) {
    return null;
  }
  return numerator.dividedBy(denominator).toNumber();
}
