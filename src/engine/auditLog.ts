import { AuditEntry, PipelineStage } from "../models/AuditEntry";
import { Citation } from "../models/Citation";

/**
 * Append-only record of every table value and assumption a case run consumed.
 * One log per run; it is frozen when the run completes.
 */
export class AuditLog {
  private readonly recorded: AuditEntry[] = [];
  private frozen: readonly AuditEntry[] | null = null;

  record(
    stage: PipelineStage,
    description: string,
    value: number | string,
    sourceLabel: string,
    sourceLocator: string
  ): void {
    if (this.frozen) {
      throw new Error(`Audit log is frozen; cannot record "${description}" for stage ${stage}`);
    }
    this.recorded.push(
      Object.freeze({
        sequence: this.recorded.length + 1,
        stage,
        description,
        value,
        sourceLabel,
        sourceLocator,
      })
    );
  }

  /**
   * Records a value against a table or override citation.
   */
  cite(stage: PipelineStage, description: string, value: number | string, citation: Citation): void {
    this.record(stage, description, value, citation.sourceLabel, citation.sourceLocator);
  }

  entries(): readonly AuditEntry[] {
    return this.frozen ?? [...this.recorded];
  }

  freeze(): readonly AuditEntry[] {
    if (!this.frozen) {
      this.frozen = Object.freeze([...this.recorded]);
    }
    return this.frozen;
  }
}
