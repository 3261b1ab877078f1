/**
 * Wage growth schedule data structures
 */

export interface GrowthEntry {
  yearIndex: number;
  calendarYear: number;
  rate: number; // applied when moving from this year to the next
  carriedForward: boolean;
}

export interface GrowthSchedule {
  basis: "override" | "table";
  entries: GrowthEntry[];
}

/**
 * Arithmetic average of the scheduled rates, 0 for an empty schedule.
 */
export function getAverageGrowthRate(schedule: GrowthSchedule): number {
  if (schedule.entries.length === 0) {
    return 0;
  }
  const total = schedule.entries.reduce((sum, entry) => sum + entry.rate, 0);
  return total / schedule.entries.length;
}
