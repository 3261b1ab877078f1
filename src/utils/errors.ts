import { PipelineStage } from "../models/AuditEntry";
import { TableKey } from "../models/ReferenceTables";

/**
 * Typed failures raised by the loss calculation pipeline.
 * None of them is retried; each one aborts the run.
 */

export type ErrorStage = PipelineStage | "config" | "tables";

export class LossCalculationError extends Error {
  readonly stage: ErrorStage;

  constructor(stage: ErrorStage, message: string) {
    super(message);
    this.name = new.target.name;
    this.stage = stage;
  }
}

export type LookupKey = Record<string, string | number>;

function describeKey(key: LookupKey): string {
  return Object.entries(key)
    .map(([name, value]) => `${name}=${value}`)
    .join(", ");
}

/**
 * Reference data is missing for the requested combination.
 * Raised by the tables with stage "tables"; the case runner re-tags it with the
 * stage that asked for the row.
 */
export class TableLookupError extends LossCalculationError {
  readonly table: TableKey;
  readonly key: LookupKey;

  constructor(table: TableKey, key: LookupKey, stage: ErrorStage = "tables") {
    super(stage, `No ${table} row for ${describeKey(key)}`);
    this.table = table;
    this.key = key;
  }

  inStage(stage: PipelineStage): TableLookupError {
    return new TableLookupError(this.table, this.key, stage);
  }
}

export class InvalidAgeError extends LossCalculationError {
  readonly age: number;
  readonly maxAge: number;

  constructor(age: number, maxAge: number) {
    super("life_expectancy", `Age ${age} is outside the life table range 0-${maxAge}`);
    this.age = age;
    this.maxAge = maxAge;
  }
}

export class InvalidConfigError extends LossCalculationError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("config", `Invalid case configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

/**
 * Runs one pipeline stage, attributing any table lookup failure to it.
 */
export function withStage<T>(stage: PipelineStage, run: () => T): T {
  try {
    return run();
  } catch (error) {
    if (error instanceof TableLookupError && error.stage === "tables") {
      throw error.inStage(stage);
    }
    throw error;
  }
}
