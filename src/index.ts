/**
 * infragen: infrastructure file generation
 *
 * Describe a project once, as services with ports, volumes, environment and
 * dependencies, then render it as Docker Compose, Ansible or Terraform.
 *
 * @packageDocumentation
 */

// Version
export { VERSION } from "./version.js";

// Domain model
export type {
  ProjectType,
  TargetKind,
  PortConfig,
  VolumeConfig,
  ServiceConfig,
  ProjectConfig,
  PresetService,
  Preset,
  GeneratedFile,
} from "./types/project.js";
export { TARGET_KINDS } from "./types/project.js";

// Generators
export {
  ComposeGenerator,
  AnsibleGenerator,
  TerraformGenerator,
  createComposeGenerator,
  createAnsibleGenerator,
  createTerraformGenerator,
  getGenerator,
  generateTargets,
} from "./generators/index.js";
export type { Generator, TargetOutcome } from "./generators/index.js";

// Presets
export {
  InMemoryPresetCatalog,
  getBundledCatalog,
  loadPresetCatalog,
  listCategories,
  createProjectFromPreset,
} from "./presets/index.js";
export type { PresetCatalog, CategorySummary } from "./presets/index.js";

// Project files
export {
  loadProject,
  saveProject,
  parseProject,
  serializeProject,
  validateProject,
  collectRecommendations,
} from "./project/index.js";
export type { Recommendation } from "./project/index.js";

// Settings
export { loadSettings, createDefaultSettings } from "./config/index.js";
export type { Settings } from "./config/index.js";

// Errors
export {
  InfragenError,
  ProjectValidationError,
  PresetNotFoundError,
  RenderError,
  ConfigError,
  FileSystemError,
  formatError,
} from "./utils/errors.js";
export type { FieldError } from "./utils/errors.js";

// Files
export { writeGeneratedFiles } from "./utils/files.js";
