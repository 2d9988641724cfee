import Decimal from 'decimal.js';

// Ledger-wide Decimal settings for quantities and money
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // No exponential notation for large numbers
  toExpNeg: -9e15,
});

export type DecimalLike = number | string | Decimal;

export const ZERO = new Decimal(0);
export const HUNDRED = new Decimal(100);

/**
 * Converts any number-like value to Decimal.
 */
export function toDecimal(value: DecimalLike): Decimal {
  return new Decimal(value);
}

/**
 * Converts Decimal back to a JavaScript number for JSON responses.
 * Rounds to 8 decimal places.
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(8).toNumber();
}

export function sum(values: Decimal[]): Decimal {
  return values.reduce((total, value) => total.plus(value), ZERO);
}

/**
 * `numerator / denominator`, or zero when the denominator is zero.
 */
export function safeDivide(numerator: Decimal, denominator: Decimal): Decimal {
  if (denominator.isZero()) {
    return ZERO;
  }
  return numerator.dividedBy(denominator);
}

/**
 * Percentage of `part` over `base`; 0 when base is zero.
 */
export function percentOf(part: Decimal, base: Decimal): Decimal {
  return safeDivide(part, base).times(HUNDRED);
}
