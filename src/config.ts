import { z } from "zod";
import { DEFAULT_TABLES_DIR } from "./utils/constants";

/**
 * Process configuration read from the environment.
 */
const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  TABLES_DIR: z.string().min(1).default(DEFAULT_TABLES_DIR),
});

export interface AppConfig {
  port: number;
  tablesDir: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment: ${issues.join("; ")}`);
  }
  return { port: result.data.PORT, tablesDir: result.data.TABLES_DIR };
}
