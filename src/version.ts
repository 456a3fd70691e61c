/**
 * Package version, read from the package.json one level above this module
 */
import { readFileSync } from "node:fs";
import { z } from "zod";
import { getLogger } from "./utils/logger.js";

const UNKNOWN_VERSION = "0.0.0";

const PackageManifestSchema = z.object({
  name: z.literal("infragen"),
  version: z.string().min(1),
});

/**
 * Version from the manifest beside `moduleUrl`'s parent directory, or 0.0.0 when unreadable
 */
export function readPackageVersion(moduleUrl: string = import.meta.url): string {
  const manifestUrl = new URL("../package.json", moduleUrl);
  try {
    const parsed = PackageManifestSchema.safeParse(
      JSON.parse(readFileSync(manifestUrl, "utf-8")),
    );
    if (parsed.success) {
      return parsed.data.version;
    }
    getLogger().debug({ manifest: manifestUrl.href, issues: parsed.error.issues.length });
  } catch (error) {
    getLogger().debug({ manifest: manifestUrl.href, error: String(error) });
  }
  return UNKNOWN_VERSION;
}

export const VERSION: string = readPackageVersion();
