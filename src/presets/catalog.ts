/**
 * Preset catalog
 *
 * Read-only lookup of presets. The bundled catalog ships beside this module
 * as presets.json; a settings file may point at extra presets that extend or
 * replace bundled ones by id.
 */

import { readFileSync } from "node:fs";
import fs from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import JSON5 from "json5";
import type { Preset } from "../types/project.js";
import { PresetCatalogFileSchema } from "./schema.js";
import { ConfigError, FileSystemError, PresetNotFoundError } from "../utils/errors.js";
import { validateDocument } from "../utils/validation.js";

export interface PresetCatalog {
  /** Throws PresetNotFoundError for an unknown id */
  getPreset(id: string): Preset;
  listPresets(): Preset[];
  listPresetsByCategory(category: string): Preset[];
}

/**
 * Category with the number of presets in it
 */
export interface CategorySummary {
  category: string;
  count: number;
}

/**
 * Catalog backed by a list of presets held in memory
 */
export class InMemoryPresetCatalog implements PresetCatalog {
  private readonly presets: Map<string, Preset>;

  constructor(presets: Preset[]) {
    this.presets = new Map(presets.map((preset) => [preset.id, preset]));
  }

  getPreset(id: string): Preset {
    const preset = this.presets.get(id);
    if (!preset) {
      throw new PresetNotFoundError(id);
    }
    return preset;
  }

  listPresets(): Preset[] {
    return [...this.presets.values()];
  }

  listPresetsByCategory(category: string): Preset[] {
    return this.listPresets().filter((preset) => preset.category === category);
  }

  /**
   * A new catalog where the given presets replace same-id entries and the rest are appended
   */
  extend(presets: Preset[]): InMemoryPresetCatalog {
    const merged = new Map(this.presets);
    for (const preset of presets) {
      merged.set(preset.id, preset);
    }
    return new InMemoryPresetCatalog([...merged.values()]);
  }
}

/**
 * Categories in first-seen order with their preset counts
 */
export function listCategories(catalog: PresetCatalog): CategorySummary[] {
  const counts = new Map<string, number>();
  for (const preset of catalog.listPresets()) {
    counts.set(preset.category, (counts.get(preset.category) ?? 0) + 1);
  }
  return [...counts].map(([category, count]) => ({ category, count }));
}

/**
 * Parse catalog file text (JSON or JSON5)
 */
export function parsePresetCatalog(content: string, sourcePath?: string): Preset[] {
  let document: unknown;
  try {
    document = JSON5.parse(content);
  } catch (error) {
    throw new ConfigError("Preset catalog is not valid JSON", {
      configPath: sourcePath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  return validateDocument(PresetCatalogFileSchema, document, {
    description: "preset catalog",
    configPath: sourcePath,
  }).presets;
}

function bundledCatalogPath(): string {
  return join(dirname(fileURLToPath(import.meta.url)), "presets.json");
}

let bundled: InMemoryPresetCatalog | null = null;

/**
 * The catalog shipped with infragen
 */
export function getBundledCatalog(): InMemoryPresetCatalog {
  if (!bundled) {
    const catalogPath = bundledCatalogPath();
    let content: string;
    try {
      content = readFileSync(catalogPath, "utf-8");
    } catch (error) {
      throw new FileSystemError(`Failed to read bundled presets: ${catalogPath}`, {
        path: catalogPath,
        operation: "read",
        cause: error instanceof Error ? error : undefined,
      });
    }
    bundled = new InMemoryPresetCatalog(parsePresetCatalog(content, catalogPath));
  }
  return bundled;
}

/**
 * Bundled catalog, extended with the presets in `customPath` when given
 */
export async function loadPresetCatalog(customPath?: string): Promise<PresetCatalog> {
  const catalog = getBundledCatalog();
  if (!customPath) {
    return catalog;
  }

  let content: string;
  try {
    content = await fs.readFile(customPath, "utf-8");
  } catch (error) {
    throw new FileSystemError(`Failed to read preset file: ${customPath}`, {
      path: customPath,
      operation: "read",
      cause: error instanceof Error ? error : undefined,
    });
  }

  return catalog.extend(parsePresetCatalog(content, customPath));
}
