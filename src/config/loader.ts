/**
 * Settings loader for infragen
 *
 * Priority, highest first:
 * 1. Command-line flags (applied by the caller)
 * 2. Environment variables
 * 3. Settings file (INFRAGEN_CONFIG, else <cwd>/.infragen.json)
 * 4. Built-in defaults
 */

import fs from "node:fs/promises";
import path from "node:path";
import JSON5 from "json5";
import { SettingsSchema, createDefaultSettings, type Settings } from "./schema.js";
import { getSettingsPathFromEnv, readEnvOverrides, type Env } from "./env.js";
import { ConfigError } from "../utils/errors.js";
import { validateDocument } from "../utils/validation.js";

export const SETTINGS_FILE_NAME = ".infragen.json";

/**
 * Load settings for a working directory
 */
export async function loadSettings(
  cwd: string = process.cwd(),
  env: Env = process.env,
): Promise<Settings> {
  const explicitPath = getSettingsPathFromEnv(env);
  const settingsPath = explicitPath
    ? path.resolve(cwd, explicitPath)
    : path.join(cwd, SETTINGS_FILE_NAME);

  const fromFile = await loadSettingsFile(settingsPath, { required: explicitPath !== undefined });

  return { ...(fromFile ?? createDefaultSettings()), ...readEnvOverrides(env) };
}

/**
 * Load one settings file, returning null when it does not exist and is not required
 */
async function loadSettingsFile(
  settingsPath: string,
  options: { required: boolean },
): Promise<Settings | null> {
  let content: string;
  try {
    content = await fs.readFile(settingsPath, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT" && !options.required) {
      return null;
    }
    throw new ConfigError("Failed to read settings", {
      configPath: settingsPath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(content);
  } catch (error) {
    throw new ConfigError("Settings file is not valid JSON", {
      configPath: settingsPath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  return validateDocument(SettingsSchema, parsed, {
    description: "settings",
    configPath: settingsPath,
  });
}
