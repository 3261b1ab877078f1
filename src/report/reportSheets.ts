import { CaseConfig } from "../models/CaseConfig";
import { CaseResult } from "../models/CaseResult";
import { yearFractions } from "../utils/time";

/**
 * Tabular views of a case result, one per workbook sheet.
 * Values stay unrounded; number formatting is the renderer's job.
 */

export const SHEET_NAMES = [
  "dashboard",
  "life_expectancy",
  "worklife_lookup",
  "wage_growth",
  "projections",
  "discount_factors",
  "present_value",
  "audit_log",
] as const;

export type SheetName = (typeof SHEET_NAMES)[number];

export type Cell = string | number | boolean | null;

export interface ReportTable {
  columns: string[];
  rows: Cell[][];
}

/**
 * A sheet's main table, plus an optional block describing how its values were resolved.
 */
export interface ReportSheet extends ReportTable {
  name: SheetName;
  details?: ReportTable;
}

function sheet(name: SheetName, columns: string[], rows: Cell[][], details?: ReportTable): ReportSheet {
  return details ? { name, columns, rows, details } : { name, columns, rows };
}

/**
 * Year-by-year fraction of a span: 1 for whole years, the remainder last.
 */
function fractionTimeline(years: number): Cell[][] {
  return yearFractions(years).map((fraction, yearIndex) => [yearIndex, fraction]);
}

function buildDashboard(config: CaseConfig, result: CaseResult): ReportSheet {
  const { person, occupation } = config;
  const { summary } = result;
  const fullName = [person.firstName, person.lastName].filter(Boolean).join(" ");
  return sheet("dashboard", ["Field", "Value"], [
    ["Case ID", result.caseId],
    ["Name", fullName || null],
    ["Sex", person.sex],
    ["Date of Birth", person.dateOfBirth],
    ["Evaluation Date", person.evaluationDate],
    ["Education", person.educationLevel],
    ["Active Status", person.activeStatus],
    ["Occupation", occupation.title ?? null],
    ["SOC Code", occupation.socCode],
    ["County", occupation.county ?? null],
    ["State", occupation.state ?? null],
    ["Base Salary (USD)", occupation.baseSalary],
    ["Age at Evaluation (years)", summary.ageAtEvaluation],
    ["Life Expectancy (years)", summary.lifeExpectancyYears],
    ["Worklife Remaining (years)", summary.worklifeYears],
    ["Average Wage Growth (%)", summary.averageWageGrowthPct],
    ["Discount Rate (%)", summary.discountRatePct],
    ["Undiscounted Earnings (USD)", summary.undiscountedEarnings],
    ["Total Economic Loss (USD)", summary.totalEconomicLoss],
  ]);
}

const LIFE_EXPECTANCY_COLUMNS = ["Basis", "Age", "Table Age", "Table Value", "Weight", "Life Expectancy"];

function buildLifeExpectancy(result: CaseResult): ReportSheet {
  const { lifeExpectancy } = result;
  const lookupRows: Cell[][] =
    lifeExpectancy.basis === "override"
      ? [["override", lifeExpectancy.age, null, null, null, lifeExpectancy.remainingYears]]
      : lifeExpectancy.rows.map((row, index) => [
          "table",
          lifeExpectancy.age,
          row.age,
          row.remainingYears,
          lifeExpectancy.weights[index],
          lifeExpectancy.remainingYears,
        ]);
  return sheet(
    "life_expectancy",
    ["YearIndex", "LifeFraction"],
    fractionTimeline(lifeExpectancy.remainingYears),
    { columns: LIFE_EXPECTANCY_COLUMNS, rows: lookupRows }
  );
}

function buildWorklife(result: CaseResult): ReportSheet {
  const { worklife } = result;
  return sheet("worklife_lookup", ["YearIndex", "PortionOfYear"], fractionTimeline(worklife.worklifeYears), {
    columns: ["Basis", "Life Expectancy", "Participation Factor", "Age Bracket", "Worklife Years", "Clamped"],
    rows: [
      [
        worklife.basis,
        worklife.lifeExpectancyYears,
        worklife.participationFactor ?? null,
        worklife.row ? `${worklife.row.ageFrom}-${worklife.row.ageTo}` : null,
        worklife.worklifeYears,
        worklife.clamped,
      ],
    ],
  });
}

/**
 * Builds every sheet, in workbook order.
 */
export function buildReportSheets(config: CaseConfig, result: CaseResult): ReportSheet[] {
  return [
    buildDashboard(config, result),
    buildLifeExpectancy(result),
    buildWorklife(result),
    sheet(
      "wage_growth",
      ["YearIndex", "Year", "GrowthRate", "CarriedForward"],
      result.growth.entries.map((entry) => [
        entry.yearIndex,
        entry.calendarYear,
        entry.rate,
        entry.carriedForward,
      ])
    ),
    sheet(
      "projections",
      ["YearIndex", "Year", "FullYearValue", "PortionOfYear", "ActualValue"],
      result.earnings.entries.map((entry) => [
        entry.yearIndex,
        entry.calendarYear,
        entry.fullYearEarnings,
        entry.yearFraction,
        entry.earnings,
      ])
    ),
    sheet(
      "discount_factors",
      ["YearIndex", "DiscountFactor"],
      result.discountFactors.entries.map((entry) => [entry.yearIndex, entry.discountFactor])
    ),
    sheet(
      "present_value",
      ["YearIndex", "PresentValue", "CumulativePV"],
      result.presentValue.entries.map((entry) => [
        entry.yearIndex,
        entry.presentValue,
        entry.cumulativePresentValue,
      ])
    ),
    sheet(
      "audit_log",
      ["Sequence", "Stage", "Description", "Value", "Source", "Locator"],
      result.audit.map((entry) => [
        entry.sequence,
        entry.stage,
        entry.description,
        entry.value,
        entry.sourceLabel,
        entry.sourceLocator,
      ])
    ),
  ];
}
