/**
 * Environment overrides for infragen settings
 *
 * INFRAGEN_CONFIG      path of the settings file
 * INFRAGEN_LOG_LEVEL   log level
 * INFRAGEN_OUTPUT_DIR  output directory for generated files
 */

import { LogLevelSchema, type Settings } from "./schema.js";
import { getLogger } from "../utils/logger.js";

export type Env = Record<string, string | undefined>;

/**
 * Settings file path named by the environment, if any
 */
export function getSettingsPathFromEnv(env: Env = process.env): string | undefined {
  return env["INFRAGEN_CONFIG"] || undefined;
}

/**
 * Settings overridden by environment variables
 */
export function readEnvOverrides(env: Env = process.env): Partial<Settings> {
  const overrides: Partial<Settings> = {};

  const level = env["INFRAGEN_LOG_LEVEL"]?.toLowerCase();
  if (level) {
    const parsed = LogLevelSchema.safeParse(level);
    if (parsed.success) {
      overrides.logLevel = parsed.data;
    } else {
      getLogger().warn(`Ignoring unknown INFRAGEN_LOG_LEVEL '${level}'`);
    }
  }

  const outputDir = env["INFRAGEN_OUTPUT_DIR"];
  if (outputDir) {
    overrides.outputDir = outputDir;
  }

  return overrides;
}
