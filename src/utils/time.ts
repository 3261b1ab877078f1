import { DAYS_PER_YEAR, YEAR_FRACTION_EPSILON } from "./constants";

/**
 * Date and horizon utilities for loss calculations.
 */

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Parses a YYYY-MM-DD string as a UTC date.
 * Returns null for malformed strings and for dates that do not exist (e.g. 2023-02-29).
 */
export function parseIsoDate(value: string): Date | null {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

function requireIsoDate(value: string): Date {
  const date = parseIsoDate(value);
  if (!date) {
    throw new Error(`Invalid date "${value}", expected YYYY-MM-DD`);
  }
  return date;
}

/**
 * Age in fractional years between two dates, using 365.25 days per year.
 *
 * @example
 * ```ts
 * ageInYears("2000-01-01", "2000-07-02") // 183 / 365.25
 * ```
 */
export function ageInYears(dateOfBirth: string, evaluationDate: string): number {
  const days = Math.round(
    (requireIsoDate(evaluationDate).getTime() - requireIsoDate(dateOfBirth).getTime()) / MS_PER_DAY
  );
  return days / DAYS_PER_YEAR;
}

export function calendarYear(isoDate: string): number {
  return requireIsoDate(isoDate).getUTCFullYear();
}

/**
 * Number of (possibly partial) projection years: ceil(years).
 */
export function horizonLength(years: number): number {
  return Math.max(0, Math.ceil(years));
}

/**
 * Splits a span of years into whole years and the fractional remainder.
 * A remainder at or below the epsilon is treated as zero.
 *
 * @example
 * ```ts
 * splitYears(2.5) // { wholeYears: 2, remainder: 0.5 }
 * ```
 */
export function splitYears(
  years: number,
  epsilon: number = YEAR_FRACTION_EPSILON
): { wholeYears: number; remainder: number } {
  const wholeYears = Math.max(0, Math.floor(years));
  const remainder = years - wholeYears;
  return { wholeYears, remainder: remainder > epsilon ? remainder : 0 };
}

/**
 * Fraction of each year in a span: 1 for every whole year, then the remainder if any.
 *
 * @example
 * ```ts
 * yearFractions(2.5) // [1, 1, 0.5]
 * ```
 */
export function yearFractions(years: number): number[] {
  const { wholeYears, remainder } = splitYears(years);
  const fractions: number[] = Array.from({ length: wholeYears }, () => 1);
  if (remainder > 0) {
    fractions.push(remainder);
  }
  return fractions;
}
