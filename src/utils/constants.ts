/**
 * Shared constants for loss calculations.
 * Centralizing these makes behavior consistent and easier to tune.
 */

/** Average days per year used to turn a date span into a fractional age. */
export const DAYS_PER_YEAR = 365.25;

/** Partial final years at or below this fraction are dropped from the projection. */
export const YEAR_FRACTION_EPSILON = 1e-6;

/** Added to the year index when discounting; 0 leaves year 0 undiscounted. */
export const DISCOUNT_TIMING_OFFSET = 0;

/** Discount series consulted when neither a rate nor a series is given. */
export const DEFAULT_DISCOUNT_SERIES = "treasury_1y";

/** Directory of the bundled reference tables, relative to the working directory. */
export const DEFAULT_TABLES_DIR = "data/tables";
