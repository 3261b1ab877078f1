import { Router, Request, Response } from "express";
import { CaseRunner } from "../case/caseRunner";
import { buildReportSheets } from "../report/reportSheets";
import { ReferenceTableCache } from "../tables/tableCache";
import {
  InvalidAgeError,
  InvalidConfigError,
  LossCalculationError,
  TableLookupError,
} from "../utils/errors";
import { parseCaseConfig } from "../utils/validation";

/**
 * Maps pipeline failures to HTTP responses.
 * Malformed input is the caller's fault (400); missing reference data means the
 * case cannot be computed with the loaded tables (422).
 */
function sendError(res: Response, context: string, error: unknown): void {
  if (error instanceof InvalidConfigError) {
    res.status(400).json({ error: "Invalid case configuration", stage: error.stage, issues: error.issues });
    return;
  }
  if (error instanceof InvalidAgeError) {
    res.status(400).json({ error: "Invalid age", stage: error.stage, message: error.message });
    return;
  }
  if (error instanceof TableLookupError) {
    res.status(422).json({
      error: "Reference data not found",
      stage: error.stage,
      table: error.table,
      key: error.key,
      message: error.message,
    });
    return;
  }
  console.error(`Error in ${context}:`, error);
  res.status(500).json({
    error: "Internal server error",
    message: error instanceof Error ? error.message : String(error),
    stage: error instanceof LossCalculationError ? error.stage : undefined,
  });
}

export function createRoutes(tableCache: ReferenceTableCache): Router {
  const router = Router();

  /**
   * GET /api/cases/run
   * Get information about the case endpoint
   */
  router.get("/cases/run", (req: Request, res: Response) => {
    res.json({
      method: "POST",
      description: "Compute the economic loss for a wrongful-death case",
      endpoint: "/api/cases/run",
      requiredFields: [
        "caseId",
        "person (dateOfBirth, evaluationDate, sex, educationLevel, activeStatus)",
        "occupation (socCode, baseSalary)",
        "assumptions (all fields optional)",
      ],
      example: "See example-case.json in the project root",
    });
  });

  /**
   * POST /api/cases/run
   * Run the full pipeline and return every intermediate schedule with the audit log
   */
  router.post("/cases/run", async (req: Request, res: Response) => {
    try {
      const config = parseCaseConfig(req.body);
      const runner = new CaseRunner(await tableCache.get());
      res.json(runner.run(config));
    } catch (error) {
      sendError(res, "case run", error);
    }
  });

  /**
   * POST /api/cases/report
   * Run the pipeline and return the summary plus the report sheets
   */
  router.post("/cases/report", async (req: Request, res: Response) => {
    try {
      const config = parseCaseConfig(req.body);
      const runner = new CaseRunner(await tableCache.get());
      const result = runner.run(config);
      res.json({
        caseId: result.caseId,
        summary: result.summary,
        sheets: buildReportSheets(config, result),
      });
    } catch (error) {
      sendError(res, "case report", error);
    }
  });

  /**
   * GET /api
   * API information endpoint
   */
  router.get("/", (req: Request, res: Response) => {
    res.json({
      message: "Forensic Economic Loss API",
      version: "1.0.0",
      endpoints: {
        run: "POST /api/cases/run - Compute total economic loss with intermediate schedules",
        report: "POST /api/cases/report - Summary and report sheets for a case",
        health: "GET /api/health - Health check",
      },
    });
  });

  /**
   * GET /api/health
   * Health check endpoint
   */
  router.get("/health", (req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  return router;
}
