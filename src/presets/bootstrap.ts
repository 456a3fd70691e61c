/**
 * Preset bootstrapper
 *
 * Turns a catalog preset into a fresh project.
 */

import type {
  PresetService,
  ProjectConfig,
  ProjectType,
  ServiceConfig,
} from "../types/project.js";
import type { PresetCatalog } from "./catalog.js";
import { getLogger } from "../utils/logger.js";

export const DEFAULT_PROJECT_VERSION = "1.0.0";

const PROJECT_TYPES = new Map<string, ProjectType>([
  ["web-app", "web-app"],
  ["microservice", "microservice"],
  ["database", "database"],
  ["ml", "ml"],
  ["infrastructure", "infrastructure"],
]);

/**
 * Project type for a preset id, falling back to "web-app" for unknown ids
 */
export function projectTypeForPreset(presetId: string): ProjectType {
  return PROJECT_TYPES.get(presetId) ?? "web-app";
}

/**
 * Copy a preset service into a project service; optional services start disabled
 */
export function serviceFromPreset(service: PresetService): ServiceConfig {
  return {
    name: service.name,
    type: service.type,
    image: service.image,
    ports: service.ports.map((port) => ({ ...port })),
    volumes: service.volumes.map((volume) => ({ ...volume })),
    environment: { ...service.environment },
    dependsOn: [...service.dependsOn],
    enabled: !service.optional,
  };
}

/**
 * Create a project from a preset.
 * Throws PresetNotFoundError when the catalog does not know the id.
 */
export function createProjectFromPreset(
  catalog: PresetCatalog,
  presetId: string,
  projectName: string,
  environment: string,
  now: Date = new Date(),
): ProjectConfig {
  const preset = catalog.getPreset(presetId);

  const config: ProjectConfig = {
    name: projectName,
    type: projectTypeForPreset(presetId),
    description: preset.description,
    version: DEFAULT_PROJECT_VERSION,
    environment,
    services: preset.services.map(serviceFromPreset),
    variables: { ...preset.variables },
    createdAt: new Date(now.getTime()),
    updatedAt: new Date(now.getTime()),
  };

  getLogger().debug({ preset: presetId, project: projectName, services: config.services.length });
  return config;
}
