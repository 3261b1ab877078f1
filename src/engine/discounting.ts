import { AssumptionChoice } from "../models/Assumption";
import { USER_OVERRIDE_LABEL } from "../models/Citation";
import {
  DiscountFactorSchedule,
  DiscountRate,
  PresentValueEntry,
  PresentValueResult,
} from "../models/Discounting";
import { EarningsSchedule } from "../models/EarningsSchedule";
import { ReferenceTables } from "../models/ReferenceTables";
import { DISCOUNT_TIMING_OFFSET } from "../utils/constants";
import { discountFactor } from "../utils/math";
import { AuditLog } from "./auditLog";

export interface DiscountRateInput {
  evaluationYear: number;
  series: string;
  choice: AssumptionChoice<number>;
}

/**
 * Picks the single discount rate for the run: the override, or the named
 * series' rate for the evaluation year. Cited once.
 */
export function resolveDiscountRate(
  input: DiscountRateInput,
  tables: ReferenceTables,
  audit: AuditLog
): DiscountRate {
  const { evaluationYear, series, choice } = input;

  if (choice.kind === "override") {
    audit.record(
      "discounting",
      "Annual discount rate",
      choice.value,
      USER_OVERRIDE_LABEL,
      "assumptions.discountRate"
    );
    return { rate: choice.value, basis: "override" };
  }

  const { row, citation } = tables.discountRate(series, evaluationYear);
  audit.cite(
    "discounting",
    `Annual discount rate (${series}, ${evaluationYear})`,
    row.rate,
    citation
  );
  return { rate: row.rate, basis: "table", series };
}

/**
 * One factor per earnings entry: 1 / (1 + rate)^(yearIndex + offset).
 */
export function computeDiscountFactors(
  earnings: EarningsSchedule,
  discountRate: DiscountRate
): DiscountFactorSchedule {
  return {
    discountRate,
    entries: earnings.entries.map((entry) => ({
      yearIndex: entry.yearIndex,
      discountFactor: discountFactor(discountRate.rate, entry.yearIndex + DISCOUNT_TIMING_OFFSET),
    })),
  };
}

/**
 * Pairs each earnings entry with its factor and accumulates the present values.
 */
export function computePresentValue(
  earnings: EarningsSchedule,
  factors: DiscountFactorSchedule
): PresentValueResult {
  if (earnings.entries.length !== factors.entries.length) {
    throw new Error(
      `Cannot pair ${earnings.entries.length} earnings entries with ${factors.entries.length} discount factors`
    );
  }

  const entries: PresentValueEntry[] = [];
  let cumulativePresentValue = 0;

  earnings.entries.forEach((entry, index) => {
    const { discountFactor: factor } = factors.entries[index];
    const presentValue = entry.earnings * factor;
    cumulativePresentValue += presentValue;
    entries.push({
      yearIndex: entry.yearIndex,
      earnings: entry.earnings,
      discountFactor: factor,
      presentValue,
      cumulativePresentValue,
    });
  });

  return { entries, totalEconomicLoss: cumulativePresentValue };
}
