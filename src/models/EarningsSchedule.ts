/**
 * Earnings projection data structures
 */

export interface EarningsEntry {
  yearIndex: number;
  calendarYear: number;
  yearFraction: number; // 1 for whole years, the remainder for the final partial year
  fullYearEarnings: number;
  earnings: number; // fullYearEarnings × yearFraction
}

export interface EarningsSchedule {
  baseSalary: number;
  entries: EarningsEntry[];
  totalYearFraction: number;
  undiscountedTotal: number;
}
