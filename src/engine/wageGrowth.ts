import { AssumptionChoice } from "../models/Assumption";
import { USER_OVERRIDE_LABEL } from "../models/Citation";
import { GrowthEntry, GrowthSchedule } from "../models/GrowthSchedule";
import { ReferenceTables } from "../models/ReferenceTables";
import { AuditLog } from "./auditLog";

export interface WageGrowthInput {
  baseYear: number; // calendar year of year index 0
  horizon: number; // ceil(work-life years)
  category: string; // SOC major group
  choice: AssumptionChoice<number>;
}

/**
 * Produces one growth rate per projection year.
 *
 * A flat override fills the whole horizon. Otherwise each calendar year is looked
 * up in the wage growth table; years after the table's last year reuse that
 * year's rate, and the reuse is cited once as carried forward.
 * A zero horizon returns an empty schedule without any lookup.
 */
export function projectWageGrowth(
  input: WageGrowthInput,
  tables: ReferenceTables,
  audit: AuditLog
): GrowthSchedule {
  const { baseYear, horizon, category, choice } = input;
  const basis = choice.kind;

  if (horizon <= 0) {
    return { basis, entries: [] };
  }

  if (choice.kind === "override") {
    audit.record(
      "wage_growth",
      `Annual wage growth rate, years ${baseYear}-${baseYear + horizon - 1}`,
      choice.value,
      USER_OVERRIDE_LABEL,
      "assumptions.wageGrowthRate"
    );
    const entries: GrowthEntry[] = [];
    for (let yearIndex = 0; yearIndex < horizon; yearIndex++) {
      entries.push({
        yearIndex,
        calendarYear: baseYear + yearIndex,
        rate: choice.value,
        carriedForward: false,
      });
    }
    return { basis, entries };
  }

  const { lastYear } = tables.wageGrowthCoverage(category);
  const entries: GrowthEntry[] = [];
  const carriedYears: number[] = [];

  for (let yearIndex = 0; yearIndex < horizon; yearIndex++) {
    const calendarYear = baseYear + yearIndex;
    const carriedForward = calendarYear > lastYear;
    const { row, citation } = tables.wageGrowth(carriedForward ? lastYear : calendarYear, category);

    if (carriedForward) {
      carriedYears.push(calendarYear);
    } else {
      audit.cite(
        "wage_growth",
        `Annual wage growth rate for SOC group ${category}, ${calendarYear}`,
        row.rate,
        citation
      );
    }

    entries.push({ yearIndex, calendarYear, rate: row.rate, carriedForward });
  }

  if (carriedYears.length > 0) {
    const { row, citation } = tables.wageGrowth(lastYear, category);
    const firstCarried = carriedYears[0];
    const lastCarried = carriedYears[carriedYears.length - 1];
    audit.cite(
      "wage_growth",
      `Annual wage growth rate for SOC group ${category}, ${lastYear} carried forward to ${firstCarried}-${lastCarried}`,
      row.rate,
      citation
    );
  }

  return { basis, entries };
}
