/**
 * Discount factor and present value data structures
 */

export interface DiscountRate {
  rate: number;
  basis: "override" | "table";
  series?: string;
}

export interface DiscountFactorEntry {
  yearIndex: number;
  discountFactor: number;
}

export interface DiscountFactorSchedule {
  discountRate: DiscountRate;
  entries: DiscountFactorEntry[];
}

export interface PresentValueEntry {
  yearIndex: number;
  earnings: number;
  discountFactor: number;
  presentValue: number;
  cumulativePresentValue: number;
}

export interface PresentValueResult {
  entries: PresentValueEntry[];
  totalEconomicLoss: number;
}
