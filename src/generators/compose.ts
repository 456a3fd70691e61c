/**
 * Docker Compose generator
 *
 * Renders docker-compose.yml and, when something belongs outside the
 * manifest, a .env file.
 */

import type { GeneratedFile, ProjectConfig, ServiceConfig } from "../types/project.js";
import type { ValidationCollector } from "../utils/validation.js";
import { BaseGenerator } from "./base.js";
import { formatPortMapping, formatVolumeMapping } from "./format.js";
import { sortedEntries } from "../utils/strings.js";

const SENSITIVE_MARKERS = ["PASSWORD", "SECRET", "KEY", "TOKEN"] as const;

/**
 * True when a service environment key should live in .env rather than the manifest
 */
export function isSensitiveEnvKey(key: string): boolean {
  const upper = key.toUpperCase();
  return SENSITIVE_MARKERS.some((marker) => upper.includes(marker));
}

/**
 * A `.env` value: bare when it is a single plain token, double-quoted with escapes otherwise
 */
export function formatEnvValue(value: string): string {
  if (/^[^\s"'\\#]*$/.test(value)) {
    return value;
  }
  return JSON.stringify(value);
}

/**
 * Docker Compose generator
 */
export class ComposeGenerator extends BaseGenerator {
  readonly target = "docker" as const;

  protected override checkTarget(config: ProjectConfig, errors: ValidationCollector): void {
    config.services.forEach((service, i) => {
      service.ports.forEach((port, j) => {
        if (!Number.isInteger(port.container) || port.container <= 0) {
          errors.add(
            `services[${i}].ports[${j}].container`,
            "container port must be a positive integer",
            port.container,
          );
        }
      });
      service.volumes.forEach((volume, j) => {
        if (volume.source === "") {
          errors.add(`services[${i}].volumes[${j}].source`, "volume source is required", "");
        }
        if (volume.target === "") {
          errors.add(`services[${i}].volumes[${j}].target`, "volume target is required", "");
        }
      });
    });
  }

  protected render(config: ProjectConfig): GeneratedFile[] {
    const files = [this.file("docker-compose.yml", this.generateComposeFile(config))];

    const env = this.generateEnvFile(config);
    if (env !== null) {
      files.push(this.file(".env", env));
    }

    return files;
  }

  /**
   * Generate the manifest body
   */
  generateComposeFile(config: ProjectConfig): string {
    let out = "services:\n";

    for (const service of config.services) {
      if (!service.enabled) continue;
      out += this.renderService(service);
      out += "\n";
    }

    const namedVolumes = config.services.flatMap((service) =>
      service.volumes.filter((volume) => volume.type === "volume").map((volume) => volume.source),
    );

    if (namedVolumes.length > 0) {
      out += "volumes:\n";
      for (const name of namedVolumes) {
        out += `  ${name}:\n`;
      }
    }

    return out;
  }

  private renderService(service: ServiceConfig): string {
    const lines = [`  ${service.name}:`];

    if (service.image) {
      lines.push(`    image: ${service.image}`);
    }

    if (service.ports.length > 0) {
      lines.push("    ports:");
      for (const port of service.ports) {
        const comment = port.protocol ? ` # ${port.protocol}` : "";
        lines.push(`      - "${formatPortMapping(port)}"${comment}`);
      }
    }

    if (service.volumes.length > 0) {
      lines.push("    volumes:");
      for (const volume of service.volumes) {
        lines.push(`      - ${formatVolumeMapping(volume, { withMode: true })}`);
      }
    }

    const environment = sortedEntries(service.environment);
    if (environment.length > 0) {
      lines.push("    environment:");
      for (const [key, value] of environment) {
        lines.push(`      ${key}: ${JSON.stringify(value)}`);
      }
    }

    if (service.dependsOn.length > 0) {
      lines.push("    depends_on:");
      for (const dependency of service.dependsOn) {
        lines.push(`      - ${dependency}`);
      }
    }

    return lines.join("\n") + "\n";
  }

  /**
   * Generate .env content, or null when nothing qualifies
   */
  generateEnvFile(config: ProjectConfig): string | null {
    const lines = sortedEntries(config.variables).map(
      ([key, value]) => `${key}=${formatEnvValue(value)}`,
    );

    for (const service of config.services) {
      const prefix = service.name.toUpperCase();
      for (const [key, value] of sortedEntries(service.environment)) {
        if (isSensitiveEnvKey(key)) {
          lines.push(`${prefix}_${key}=${formatEnvValue(value)}`);
        }
      }
    }

    if (lines.length === 0) {
      return null;
    }

    return lines.join("\n") + "\n";
  }
}

/**
 * Create a Docker Compose generator
 */
export function createComposeGenerator(): ComposeGenerator {
  return new ComposeGenerator();
}
