/**
 * Whole-project validation and advisories
 */

import type { ProjectConfig } from "../types/project.js";
import { checkProjectStructure } from "../generators/validation.js";
import { ValidationCollector } from "../utils/validation.js";

const SENSITIVE_KEYWORDS = ["password", "secret", "key", "token", "auth"] as const;

/**
 * A non-fatal observation about a project
 */
export interface Recommendation {
  severity: "warning" | "security";
  message: string;
}

/**
 * Validate a project independently of any target.
 * Throws ProjectValidationError listing every problem.
 */
export function validateProject(config: ProjectConfig): void {
  const errors = new ValidationCollector();

  if (config.type === "") {
    errors.add("type", "project type is required", config.type);
  }
  checkProjectStructure(config, errors);

  errors.throwIfAny();
}

/**
 * True when the key contains a keyword that usually marks a credential
 */
export function containsSensitiveKeyword(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEYWORDS.some((keyword) => lower.includes(keyword));
}

/**
 * Collect warnings about likely mistakes and values that look like credentials
 */
export function collectRecommendations(config: ProjectConfig): Recommendation[] {
  const recommendations: Recommendation[] = [];

  for (const service of config.services) {
    if (service.enabled && !service.image) {
      recommendations.push({
        severity: "warning",
        message: `Service '${service.name}' is enabled but has no Docker image specified`,
      });
    }
    if (service.type === "frontend" && service.ports.length === 0) {
      recommendations.push({
        severity: "warning",
        message: `Frontend service '${service.name}' has no ports specified`,
      });
    }
    if (service.type === "database" && service.volumes.length === 0) {
      recommendations.push({
        severity: "warning",
        message: `Database service '${service.name}' has no persistent volumes`,
      });
    }
  }

  for (const key of Object.keys(config.variables).sort()) {
    if (containsSensitiveKeyword(key)) {
      recommendations.push({
        severity: "security",
        message: `Variable '${key}' contains sensitive data - consider using environment variables`,
      });
    }
  }

  for (const service of config.services) {
    for (const key of Object.keys(service.environment).sort()) {
      if (containsSensitiveKeyword(key)) {
        recommendations.push({
          severity: "security",
          message: `Service '${service.name}' environment variable '${key}' contains sensitive data`,
        });
      }
    }
  }

  return recommendations;
}
