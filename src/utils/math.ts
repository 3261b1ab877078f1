/**
 * Financial calculation utilities for earnings projections and discounting.
 * All calculations use annual periods.
 */

/**
 * Performs linear interpolation between two points.
 * Returns the y-value corresponding to x, given two reference points (x1, y1) and (x2, y2).
 *
 * @param x - Input value to interpolate for
 * @param x1 - First reference x-coordinate
 * @param y1 - First reference y-coordinate
 * @param x2 - Second reference x-coordinate
 * @param y2 - Second reference y-coordinate
 * @returns Interpolated y-value
 */
export function interpolate(
  x: number,
  x1: number,
  y1: number,
  x2: number,
  y2: number
): number {
  if (x2 === x1) {
    return y1;
  }
  return y1 + ((y2 - y1) * (x - x1)) / (x2 - x1);
}

/**
 * Present-value multiplier for an amount received `periods` years from now.
 * Formula: DF = 1 / (1 + r)^t
 *
 * @param rate - Annual discount rate as a decimal
 * @param periods - Years from the evaluation date (may be fractional)
 */
export function discountFactor(rate: number, periods: number): number {
  return 1 / Math.pow(1 + rate, periods);
}

/**
 * Sums values left to right, so totals computed over the same sequence agree exactly.
 */
export function sum(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}
