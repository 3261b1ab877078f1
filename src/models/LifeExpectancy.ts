import { LifeTableRow } from "./ReferenceTables";

/**
 * Life expectancy data structures
 */

export interface LifeExpectancyResult {
  age: number;
  remainingYears: number;
  basis: "override" | "table";
  rows: LifeTableRow[]; // bracketing rows, empty for an override
  weights: number[]; // interpolation weight per row
}
