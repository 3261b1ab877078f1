import { CASE_CONFIGURATION_LABEL } from "../models/Citation";
import { EarningsEntry, EarningsSchedule } from "../models/EarningsSchedule";
import { GrowthSchedule } from "../models/GrowthSchedule";
import { sum } from "../utils/math";
import { yearFractions } from "../utils/time";
import { AuditLog } from "./auditLog";

export interface EarningsInput {
  baseSalary: number;
  growth: GrowthSchedule;
  worklifeYears: number;
  baseYear: number;
}

/**
 * Growth rate leading out of `yearIndex`.
 */
function rateAt(growth: GrowthSchedule, yearIndex: number): number {
  const entry = growth.entries[yearIndex];
  if (!entry) {
    throw new Error(
      `Growth schedule covers ${growth.entries.length} years but year ${yearIndex} was requested`
    );
  }
  return entry.rate;
}

/**
 * Projects nominal earnings year by year over the work-life horizon.
 *
 * Year 0 earns the base salary; each later year compounds the previous one by
 * the prior year's growth rate. A fractional remainder of work-life adds a final
 * entry prorated by that fraction. No rounding is applied.
 */
export function projectEarnings(input: EarningsInput, audit: AuditLog): EarningsSchedule {
  const { baseSalary, growth, worklifeYears, baseYear } = input;
  const fractions = yearFractions(worklifeYears);

  const entries: EarningsEntry[] = [];
  let fullYearEarnings = baseSalary;

  fractions.forEach((yearFraction, yearIndex) => {
    if (yearIndex > 0) {
      fullYearEarnings *= 1 + rateAt(growth, yearIndex - 1);
    }
    entries.push({
      yearIndex,
      calendarYear: baseYear + yearIndex,
      yearFraction,
      fullYearEarnings,
      earnings: fullYearEarnings * yearFraction,
    });
  });

  if (entries.length > 0) {
    audit.record(
      "earnings",
      "Base annual salary",
      baseSalary,
      CASE_CONFIGURATION_LABEL,
      "occupation.baseSalary"
    );
  }

  return {
    baseSalary,
    entries,
    totalYearFraction: sum(fractions),
    undiscountedTotal: sum(entries.map((entry) => entry.earnings)),
  };
}
