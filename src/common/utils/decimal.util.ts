import Decimal from 'decimal.js';

Decimal.set({
  precision: 28,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,
  toExpNeg: -9e15,
});

export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/**
 * Converts back to a JS number, rounded to 8 decimal places (crypto precision).
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(8).toNumber();
}

/**
 * Column form for TypeORM `decimal` columns.
 */
export function toColumn(value: number | Decimal): string {
  return toDecimal(value).toDecimalPlaces(12).toFixed();
}

export function fromColumn(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined || value === '') {
    return null;
  }
  const parsed = typeof value === 'number' ? value : parseFloat(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function sum(values: Decimal[]): Decimal {
  return values.reduce((acc, val) => acc.plus(val), new Decimal(0));
}

/**
 * Ratio as a percentage; zero denominators yield zero.
 */
export function percentOf(part: Decimal, whole: Decimal): Decimal {
  if (whole.isZero()) {
    return new Decimal(0);
  }
  return part.dividedBy(whole).times(100);
}

/**
 * Rounds half-up to the nearest multiple of `step`. Non-positive steps leave
 * the value unchanged.
 */
export function roundToStep(value: Decimal, step: Decimal): Decimal {
  if (step.lte(0)) {
    return value;
  }
  return value.dividedBy(step).toDecimalPlaces(0, Decimal.ROUND_HALF_UP).times(step);
}
