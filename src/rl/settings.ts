/**
 * Runtime settings read from the process environment (.env.local is loaded
 * by the CLI before this is called).
 */

import { z } from "zod";
import { ConfigError } from "./errors";

const settingsSchema = z.object({
  SHOPFLOOR_DB_PATH: z.string().min(1).default("shopfloor.db"),
  SHOPFLOOR_OUTPUT_DIR: z.string().min(1).default("outputs"),
  SHOPFLOOR_FACILITY_CONFIG: z.string().min(1).optional(),
  SHOPFLOOR_SEED: z.coerce.number().int().optional(),
});

export interface Settings {
  dbPath: string;
  outputDir: string;
  facilityConfigPath?: string;
  seed?: number;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const result = settingsSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      "Invalid environment settings",
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const data = result.data;
  return {
    dbPath: data.SHOPFLOOR_DB_PATH,
    outputDir: data.SHOPFLOOR_OUTPUT_DIR,
    facilityConfigPath: data.SHOPFLOOR_FACILITY_CONFIG,
    seed: data.SHOPFLOOR_SEED,
  };
}
