/**
 * Audit log data structures
 */

export const PIPELINE_STAGES = [
  "life_expectancy",
  "worklife",
  "wage_growth",
  "earnings",
  "discounting",
] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export interface AuditEntry {
  sequence: number; // 1-based, in recording order
  stage: PipelineStage;
  description: string;
  value: number | string;
  sourceLabel: string;
  sourceLocator: string;
}
