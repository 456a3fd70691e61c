/**
 * Presets: the catalog and the bootstrapper that instantiates projects from it
 */

export {
  InMemoryPresetCatalog,
  getBundledCatalog,
  loadPresetCatalog,
  listCategories,
  parsePresetCatalog,
  type PresetCatalog,
  type CategorySummary,
} from "./catalog.js";
export {
  createProjectFromPreset,
  projectTypeForPreset,
  serviceFromPreset,
  DEFAULT_PROJECT_VERSION,
} from "./bootstrap.js";
export { PresetSchema, PresetServiceSchema, PresetCatalogFileSchema } from "./schema.js";
