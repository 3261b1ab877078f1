import { WorklifeChoice } from "../models/Assumption";
import { EducationLevel, Sex } from "../models/CaseConfig";
import { CASE_CONFIGURATION_LABEL, USER_OVERRIDE_LABEL } from "../models/Citation";
import { LifeExpectancyResult } from "../models/LifeExpectancy";
import { ReferenceTables } from "../models/ReferenceTables";
import { WorkLifeResult } from "../models/WorkLife";
import { AuditLog } from "./auditLog";

export interface WorklifeInput {
  lifeExpectancy: LifeExpectancyResult;
  sex: Sex;
  education: EducationLevel;
  choice: WorklifeChoice;
}

/**
 * Caps a work-life estimate at the remaining lifespan.
 */
function clampToLifeExpectancy(
  years: number,
  lifeExpectancyYears: number
): { worklifeYears: number; clamped: boolean } {
  const nonNegative = Math.max(0, years);
  if (nonNegative > lifeExpectancyYears) {
    return { worklifeYears: lifeExpectancyYears, clamped: true };
  }
  return { worklifeYears: nonNegative, clamped: false };
}

/**
 * Converts remaining life expectancy into expected remaining years in the labor force.
 *
 * - inactive: 0 regardless of tables
 * - override: the given years
 * - retirement_age_hint: retirement age minus current age
 * - participation_table: participation factor × remaining life years
 *
 * Every result is capped at the life expectancy.
 */
export function resolveWorklifeExpectancy(
  input: WorklifeInput,
  tables: ReferenceTables,
  audit: AuditLog
): WorkLifeResult {
  const { lifeExpectancy, sex, education, choice } = input;
  const lifeExpectancyYears = lifeExpectancy.remainingYears;

  switch (choice.kind) {
    case "inactive": {
      audit.record(
        "worklife",
        "Active status is inactive; no remaining work-life",
        "inactive",
        CASE_CONFIGURATION_LABEL,
        "person.activeStatus"
      );
      return { worklifeYears: 0, lifeExpectancyYears, basis: "inactive", clamped: false };
    }

    case "override": {
      audit.record(
        "worklife",
        "Remaining work-life expectancy (years)",
        choice.value,
        USER_OVERRIDE_LABEL,
        "assumptions.worklifeYears"
      );
      return {
        ...clampToLifeExpectancy(choice.value, lifeExpectancyYears),
        lifeExpectancyYears,
        basis: "override",
      };
    }

    case "retirement_age_hint": {
      audit.record(
        "worklife",
        "Retirement age hint",
        choice.retirementAge,
        USER_OVERRIDE_LABEL,
        "assumptions.retirementAgeHint"
      );
      return {
        ...clampToLifeExpectancy(choice.retirementAge - lifeExpectancy.age, lifeExpectancyYears),
        lifeExpectancyYears,
        basis: "retirement_age_hint",
      };
    }

    case "participation_table": {
      const { row, citation } = tables.participation(lifeExpectancy.age, sex, education);
      audit.cite(
        "worklife",
        `Labor-force participation factor (${sex}, ${education}, ages ${row.ageFrom}-${row.ageTo})`,
        row.participationFactor,
        citation
      );
      return {
        ...clampToLifeExpectancy(row.participationFactor * lifeExpectancyYears, lifeExpectancyYears),
        lifeExpectancyYears,
        basis: "participation_table",
        participationFactor: row.participationFactor,
        row,
      };
    }
  }
}
