import { AssumptionChoice } from "../models/Assumption";
import { Sex } from "../models/CaseConfig";
import { USER_OVERRIDE_LABEL } from "../models/Citation";
import { LifeExpectancyResult } from "../models/LifeExpectancy";
import { ReferenceTables } from "../models/ReferenceTables";
import { InvalidAgeError } from "../utils/errors";
import { interpolate } from "../utils/math";
import { AuditLog } from "./auditLog";

export interface LifeExpectancyInput {
  age: number;
  sex: Sex;
  choice: AssumptionChoice<number>;
}

/**
 * Resolves remaining life expectancy at a (possibly fractional) age.
 *
 * An override is returned verbatim without touching the table. Otherwise the two
 * integer-age rows bracketing `age` are linearly interpolated; a whole-number age
 * (or the table's last age) uses a single row.
 *
 * @throws InvalidAgeError if the age falls outside the life table
 */
export function resolveLifeExpectancy(
  input: LifeExpectancyInput,
  tables: ReferenceTables,
  audit: AuditLog
): LifeExpectancyResult {
  const { age, sex, choice } = input;

  if (choice.kind === "override") {
    audit.record(
      "life_expectancy",
      "Remaining life expectancy (years)",
      choice.value,
      USER_OVERRIDE_LABEL,
      "assumptions.lifeExpectancyYears"
    );
    return { age, remainingYears: choice.value, basis: "override", rows: [], weights: [] };
  }

  const maxAge = tables.lifeTableMaxAge(sex);
  if (age < 0 || age > maxAge) {
    throw new InvalidAgeError(age, maxAge);
  }

  const lowerAge = Math.floor(age);
  const fraction = age - lowerAge;
  const lower = tables.lifeExpectancy(lowerAge, sex);
  audit.cite(
    "life_expectancy",
    `Remaining life expectancy at age ${lowerAge}`,
    lower.row.remainingYears,
    lower.citation
  );

  if (fraction === 0) {
    return {
      age,
      remainingYears: lower.row.remainingYears,
      basis: "table",
      rows: [lower.row],
      weights: [1],
    };
  }

  const upper = tables.lifeExpectancy(lowerAge + 1, sex);
  audit.cite(
    "life_expectancy",
    `Remaining life expectancy at age ${lowerAge + 1}`,
    upper.row.remainingYears,
    upper.citation
  );

  const remainingYears = interpolate(
    age,
    lowerAge,
    lower.row.remainingYears,
    lowerAge + 1,
    upper.row.remainingYears
  );

  return {
    age,
    remainingYears: Math.max(0, remainingYears),
    basis: "table",
    rows: [lower.row, upper.row],
    weights: [1 - fraction, fraction],
  };
}
