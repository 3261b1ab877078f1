import { AuditEntry } from "./AuditEntry";
import { DiscountFactorSchedule, PresentValueResult } from "./Discounting";
import { EarningsSchedule } from "./EarningsSchedule";
import { GrowthSchedule } from "./GrowthSchedule";
import { LifeExpectancyResult } from "./LifeExpectancy";
import { WorkLifeResult } from "./WorkLife";

/**
 * Case result data structures
 */

export interface CaseSummary {
  ageAtEvaluation: number;
  lifeExpectancyYears: number;
  worklifeYears: number;
  averageWageGrowthPct: number;
  discountRatePct: number;
  undiscountedEarnings: number;
  totalEconomicLoss: number;
}

export interface CaseResult {
  caseId: string;
  baseYear: number;
  lifeExpectancy: LifeExpectancyResult;
  worklife: WorkLifeResult;
  growth: GrowthSchedule;
  earnings: EarningsSchedule;
  discountFactors: DiscountFactorSchedule;
  presentValue: PresentValueResult;
  audit: readonly AuditEntry[];
  summary: CaseSummary;
  totalLoss: number;
}
