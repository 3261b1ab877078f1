import { Cited } from "./Citation";
import { EducationLevel, Sex } from "./CaseConfig";

/**
 * Reference table data structures
 */

export interface LifeTableRow {
  sex: Sex;
  age: number;
  remainingYears: number;
}

export interface WorklifeTableRow {
  sex: Sex;
  education: EducationLevel;
  ageFrom: number; // inclusive
  ageTo: number; // inclusive
  participationFactor: number; // share of remaining life spent in the labor force
}

export interface WageGrowthRow {
  category: string; // SOC major group
  year: number;
  rate: number;
}

export interface DiscountRateRow {
  series: string;
  year: number;
  rate: number;
}

export interface YearCoverage {
  firstYear: number;
  lastYear: number;
}

export const TABLE_KEYS = ["life_table", "worklife_table", "wage_growth", "discount_rates"] as const;
export type TableKey = (typeof TABLE_KEYS)[number];

/**
 * Read-only lookups shared by every case run in the process.
 * Every method throws TableLookupError when the requested combination is absent.
 */
export interface ReferenceTables {
  lifeExpectancy(age: number, sex: Sex): Cited<LifeTableRow>;
  lifeTableMaxAge(sex: Sex): number;
  participation(age: number, sex: Sex, education: EducationLevel): Cited<WorklifeTableRow>;
  wageGrowth(year: number, category: string): Cited<WageGrowthRow>;
  wageGrowthCoverage(category: string): YearCoverage;
  discountRate(series: string, year: number): Cited<DiscountRateRow>;
}
