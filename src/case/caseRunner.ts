import { AssumptionChoice, WorklifeChoice, chooseAssumption } from "../models/Assumption";
import { CaseConfig, getOccupationCategory } from "../models/CaseConfig";
import { CaseResult } from "../models/CaseResult";
import { getAverageGrowthRate } from "../models/GrowthSchedule";
import { ReferenceTables } from "../models/ReferenceTables";
import { AuditLog } from "../engine/auditLog";
import { computeDiscountFactors, computePresentValue, resolveDiscountRate } from "../engine/discounting";
import { projectEarnings } from "../engine/earnings";
import { resolveLifeExpectancy } from "../engine/lifeExpectancy";
import { projectWageGrowth } from "../engine/wageGrowth";
import { resolveWorklifeExpectancy } from "../engine/worklife";
import { DEFAULT_DISCOUNT_SERIES } from "../utils/constants";
import { withStage } from "../utils/errors";
import { ageInYears, calendarYear, horizonLength } from "../utils/time";
import { parseCaseConfig } from "../utils/validation";

/**
 * Stage choices resolved once from the case assumptions.
 */
interface StageChoices {
  lifeExpectancy: AssumptionChoice<number>;
  worklife: WorklifeChoice;
  wageGrowth: AssumptionChoice<number>;
  discountRate: AssumptionChoice<number>;
}

function resolveStageChoices(config: CaseConfig): StageChoices {
  const { person, assumptions } = config;

  let worklife: WorklifeChoice;
  if (person.activeStatus === "inactive") {
    worklife = { kind: "inactive" };
  } else if (assumptions.worklifeYears !== undefined) {
    worklife = { kind: "override", value: assumptions.worklifeYears };
  } else if (
    assumptions.retirementAgeHint !== undefined &&
    assumptions.worklifeMethod !== "participation_table"
  ) {
    worklife = { kind: "retirement_age_hint", retirementAge: assumptions.retirementAgeHint };
  } else {
    worklife = { kind: "participation_table" };
  }

  return {
    lifeExpectancy: chooseAssumption(assumptions.lifeExpectancyYears),
    worklife,
    wageGrowth: chooseAssumption(assumptions.wageGrowthRate),
    discountRate: chooseAssumption(assumptions.discountRate),
  };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Runs the loss calculation pipeline for one case.
 *
 * Stages run strictly in order (life expectancy, work-life, wage growth,
 * earnings, discounting), each consuming only its predecessor's output.
 * Every run gets its own audit log; the reference tables are shared and read-only.
 */
export class CaseRunner {
  private readonly tables: ReferenceTables;

  constructor(tables: ReferenceTables) {
    this.tables = tables;
  }

  /**
   * @throws InvalidConfigError before any computation when the configuration is malformed
   * @throws InvalidAgeError when the age falls outside the life table
   * @throws TableLookupError tagged with the stage whose lookup failed
   */
  run(input: CaseConfig): CaseResult {
    const config = parseCaseConfig(input);
    const { person, occupation, assumptions } = config;
    const tables = this.tables;
    const audit = new AuditLog();

    const age = ageInYears(person.dateOfBirth, person.evaluationDate);
    const baseYear = calendarYear(person.evaluationDate);
    const choices = resolveStageChoices(config);

    const lifeExpectancy = withStage("life_expectancy", () =>
      resolveLifeExpectancy({ age, sex: person.sex, choice: choices.lifeExpectancy }, tables, audit)
    );

    const worklife = withStage("worklife", () =>
      resolveWorklifeExpectancy(
        {
          lifeExpectancy,
          sex: person.sex,
          education: person.educationLevel,
          choice: choices.worklife,
        },
        tables,
        audit
      )
    );

    const growth = withStage("wage_growth", () =>
      projectWageGrowth(
        {
          baseYear,
          horizon: horizonLength(worklife.worklifeYears),
          category: getOccupationCategory(occupation),
          choice: choices.wageGrowth,
        },
        tables,
        audit
      )
    );

    const earnings = withStage("earnings", () =>
      projectEarnings(
        {
          baseSalary: occupation.baseSalary,
          growth,
          worklifeYears: worklife.worklifeYears,
          baseYear,
        },
        audit
      )
    );

    const { discountFactors, presentValue } = withStage("discounting", () => {
      const discountRate = resolveDiscountRate(
        {
          evaluationYear: baseYear,
          series: assumptions.discountSeries ?? DEFAULT_DISCOUNT_SERIES,
          choice: choices.discountRate,
        },
        tables,
        audit
      );
      const factors = computeDiscountFactors(earnings, discountRate);
      return { discountFactors: factors, presentValue: computePresentValue(earnings, factors) };
    });

    const totalLoss = presentValue.totalEconomicLoss;

    return deepFreeze<CaseResult>({
      caseId: config.caseId,
      baseYear,
      lifeExpectancy,
      worklife,
      growth,
      earnings,
      discountFactors,
      presentValue,
      audit: audit.freeze(),
      summary: {
        ageAtEvaluation: age,
        lifeExpectancyYears: lifeExpectancy.remainingYears,
        worklifeYears: worklife.worklifeYears,
        averageWageGrowthPct: getAverageGrowthRate(growth) * 100,
        discountRatePct: discountFactors.discountRate.rate * 100,
        undiscountedEarnings: earnings.undiscountedTotal,
        totalEconomicLoss: totalLoss,
      },
      totalLoss,
    });
  }
}
