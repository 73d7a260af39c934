import * as fs from "node:fs";
import * as path from "node:path";
import { ConfigSchema, type Config } from "@ghgql/shared";
import { ConfigurationError } from "./errors.js";

export const CONFIG_FILE_NAME = "github-gql.config.json";

/** Config file location: $GITHUB_GQL_CONFIG, else github-gql.config.json in the cwd. */
export function configPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.GITHUB_GQL_CONFIG;
  if (override && override.trim().length > 0) {
    return path.resolve(override.trim());
  }
  return path.join(process.cwd(), CONFIG_FILE_NAME);
}

/**
 * Load and validate the provider config file.
 * Falls back to schema defaults if the file does not exist.
 */
export function loadConfig(filePath: string = configPath()): Config {
  if (!fs.existsSync(filePath)) {
    console.log(`[config] No ${path.basename(filePath)} found - using defaults`);
    return ConfigSchema.parse({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`${filePath} is not valid JSON`, {
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    console.error("[config] Invalid config file:", result.error.format());
    throw new ConfigurationError(`Invalid ${path.basename(filePath)}`, {
      issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }

  console.log(`[config] Loaded ${filePath}`);
  return result.data;
}
