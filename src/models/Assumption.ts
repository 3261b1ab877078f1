/**
 * Per-stage assumption choices, resolved once from the case configuration.
 */

export type AssumptionChoice<T> =
  | { kind: "override"; value: T }
  | { kind: "table" };

export type WorklifeChoice =
  | { kind: "inactive" }
  | { kind: "override"; value: number }
  | { kind: "retirement_age_hint"; retirementAge: number }
  | { kind: "participation_table" };

/**
 * An explicitly supplied value wins; otherwise the stage consults its table.
 */
export function chooseAssumption<T>(value: T | undefined): AssumptionChoice<T> {
  return value === undefined ? { kind: "table" } : { kind: "override", value };
}
