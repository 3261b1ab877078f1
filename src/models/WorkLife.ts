import { WorklifeTableRow } from "./ReferenceTables";

/**
 * Work-life expectancy data structures
 */

export type WorklifeBasis = "inactive" | "override" | "retirement_age_hint" | "participation_table";

export interface WorkLifeResult {
  worklifeYears: number;
  lifeExpectancyYears: number;
  basis: WorklifeBasis;
  participationFactor?: number;
  row?: WorklifeTableRow;
  clamped: boolean; // true when the raw estimate exceeded life expectancy
}
