import * as fs from "fs";
import * as path from "path";
import { CaseRunner } from "./src/case/caseRunner";
import { loadConfig } from "./src/config";
import { buildReportSheets } from "./src/report/reportSheets";
import { loadReferenceTables } from "./src/tables/referenceTables";
import { FileTableProvider } from "./src/tables/tableProvider";
import { LossCalculationError } from "./src/utils/errors";
import { parseCaseConfig } from "./src/utils/validation";

/**
 * Run one case and write its result and report sheets to <caseId>-result.json
 * (generated in the working directory).
 * Usage: npx ts-node run-case.ts [case-file]
 * Default input: example-case.json
 */
async function main(): Promise<void> {
  const inputPath = process.argv[2] ?? "example-case.json";

  let inputData: unknown;
  try {
    const raw = fs.readFileSync(path.resolve(inputPath), "utf-8");
    inputData = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Failed to read or parse case file "${inputPath}": ${message}`);
    process.exit(1);
  }

  const config = parseCaseConfig(inputData);
  const { tablesDir } = loadConfig();
  const tables = await loadReferenceTables(new FileTableProvider(tablesDir));

  console.log(`Running case ${config.caseId}...`);
  const result = new CaseRunner(tables).run(config);

  const outputPath = `${config.caseId}-result.json`;
  fs.writeFileSync(
    outputPath,
    JSON.stringify({ result, sheets: buildReportSheets(config, result) }, null, 2)
  );

  const { summary } = result;
  console.log(`Life expectancy: ${summary.lifeExpectancyYears.toFixed(2)} years`);
  console.log(`Worklife remaining: ${summary.worklifeYears.toFixed(2)} years`);
  console.log(`Average wage growth: ${summary.averageWageGrowthPct.toFixed(2)}%`);
  console.log(`Discount rate: ${summary.discountRatePct.toFixed(2)}%`);
  console.log(`Total economic loss: $${summary.totalEconomicLoss.toFixed(2)}`);
  console.log(`Output saved to ${outputPath}`);
}

main().catch((error: unknown) => {
  if (error instanceof LossCalculationError) {
    console.error(`${error.name} (${error.stage}): ${error.message}`);
  } else {
    console.error("Case run failed:", error);
  }
  process.exit(1);
});
