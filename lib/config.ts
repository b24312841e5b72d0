/**
 * Server-side configuration from environment variables.
 * SCENARIO_DATA_DIR: directory holding the scenario CSVs. Defaults to ./data.
 */

import path from "node:path";
import { z } from "zod";

const EnvSchema = z.object({
  SCENARIO_DATA_DIR: z.string().min(1).optional(),
});

export interface AppConfig {
  scenarioDataDir: string;
}

export function loadConfig(env: Partial<NodeJS.ProcessEnv> = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);
  return {
    scenarioDataDir: path.resolve(
      process.cwd(),
      parsed.SCENARIO_DATA_DIR ?? "data"
    ),
  };
}
