/**
 * Settings for infragen
 */

export { loadSettings, SETTINGS_FILE_NAME } from "./loader.js";
export { getSettingsPathFromEnv, readEnvOverrides, type Env } from "./env.js";
export {
  SettingsSchema,
  LogLevelSchema,
  TargetKindSchema,
  createDefaultSettings,
  type Settings,
} from "./schema.js";
