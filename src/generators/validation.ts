/**
 * Structural checks shared by every target
 */

import type { ProjectConfig } from "../types/project.js";
import type { ValidationCollector } from "../utils/validation.js";

/**
 * Record every structural problem with the project on the collector
 */
export function checkProjectStructure(config: ProjectConfig, errors: ValidationCollector): void {
  if (config.name === "") {
    errors.add("name", "project name is required", config.name);
  }

  if (config.services.length === 0) {
    errors.add("services", "at least one service is required", config.services.length);
  }

  config.services.forEach((service, i) => {
    if (service.name === "") {
      errors.add(`services[${i}].name`, "service name is required", service.name);
    }
    if (service.type === "") {
      errors.add(`services[${i}].type`, "service type is required", service.type);
    }
  });

  const seen = new Set<string>();
  for (const service of config.services) {
    if (service.name !== "" && seen.has(service.name)) {
      errors.add("services", `duplicate service name: ${service.name}`, service.name);
    }
    seen.add(service.name);
  }
}
