/**
 * Case configuration data structures
 */

export const SEXES = ["male", "female"] as const;
export type Sex = (typeof SEXES)[number];

export const EDUCATION_LEVELS = ["HS", "SomeCollege", "BA", "MA", "PhD", "Other"] as const;
export type EducationLevel = (typeof EDUCATION_LEVELS)[number];

export const ACTIVE_STATUSES = ["active", "inactive"] as const;
export type ActiveStatus = (typeof ACTIVE_STATUSES)[number];

export const WORKLIFE_METHODS = ["participation_table", "retirement_age_hint"] as const;
export type WorklifeMethod = (typeof WORKLIFE_METHODS)[number];

export interface Person {
  firstName?: string;
  lastName?: string;
  dateOfBirth: string; // YYYY-MM-DD
  evaluationDate: string; // YYYY-MM-DD, usually the date of death
  sex: Sex;
  educationLevel: EducationLevel;
  activeStatus: ActiveStatus;
}

export interface Occupation {
  socCode: string; // Standard Occupational Classification, e.g. "11-2022"
  title?: string;
  county?: string;
  state?: string;
  baseSalary: number; // annual, USD
}

/**
 * Optional overrides. Anything left undefined is resolved from the reference tables.
 * Rates are decimals (0.037 means 3.7%).
 */
export interface CaseAssumptions {
  retirementAgeHint?: number;
  lifeExpectancyYears?: number;
  worklifeMethod?: WorklifeMethod;
  worklifeYears?: number;
  discountRate?: number;
  discountSeries?: string;
  wageGrowthRate?: number;
}

export interface CaseConfig {
  caseId: string;
  person: Person;
  occupation: Occupation;
  assumptions: CaseAssumptions;
}

/**
 * SOC major group ("11-2022" -> "11"), the wage growth table category.
 */
export function getOccupationCategory(occupation: Occupation): string {
  return occupation.socCode.slice(0, 2);
}
