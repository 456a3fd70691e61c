/**
 * Settings schema for infragen
 */

import { z } from "zod";

export const LogLevelSchema = z.enum(["silly", "trace", "debug", "info", "warn", "error", "fatal"]);

export const TargetKindSchema = z.enum(["docker", "ansible", "terraform"]);

/**
 * Settings file schema (.infragen.json)
 */
export const SettingsSchema = z.object({
  /** Project file read by generate/validate/list and written by init */
  projectFile: z.string().min(1).default("infragen.yml"),
  /** Directory generated files are written under */
  outputDir: z.string().min(1).default("."),
  logLevel: LogLevelSchema.default("info"),
  /** Targets `generate all` and `validate --target all` cover */
  targets: z.array(TargetKindSchema).min(1).default(["docker", "ansible", "terraform"]),
  /** Extra preset catalog merged over the bundled one */
  presetsFile: z.string().optional(),
});

export type Settings = z.infer<typeof SettingsSchema>;

/**
 * Create default settings
 */
export function createDefaultSettings(): Settings {
  return SettingsSchema.parse({});
}
