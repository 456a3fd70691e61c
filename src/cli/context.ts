/**
 * Shared setup for CLI commands
 */

import path from "node:path";
import { loadSettings } from "../config/loader.js";
import type { Settings } from "../config/schema.js";
import { loadPresetCatalog, type PresetCatalog } from "../presets/catalog.js";
import { createLogger, setLogger } from "../utils/logger.js";

export interface CommandContext {
  cwd: string;
  settings: Settings;
}

/**
 * Load settings for a command and configure the global logger from them
 */
export async function createCommandContext(cwd: string = process.cwd()): Promise<CommandContext> {
  const settings = await loadSettings(cwd);
  setLogger(
    createLogger({ level: settings.logLevel, prettyPrint: process.stdout.isTTY ?? false }),
  );
  return { cwd, settings };
}

/**
 * Project file path: the --config flag when given, else the configured default
 */
export function resolveProjectFile(context: CommandContext, override?: string): string {
  return path.resolve(context.cwd, override ?? context.settings.projectFile);
}

/**
 * Output directory: the --output flag when given, else the configured default
 */
export function resolveOutputDir(context: CommandContext, override?: string): string {
  return path.resolve(context.cwd, override ?? context.settings.outputDir);
}

/**
 * The preset catalog, including any presets file named in the settings
 */
export function loadCatalog(context: CommandContext): Promise<PresetCatalog> {
  const { presetsFile } = context.settings;
  return loadPresetCatalog(presetsFile ? path.resolve(context.cwd, presetsFile) : undefined);
}
