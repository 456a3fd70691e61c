/**
 * Ansible generator
 *
 * Renders a playbook that installs Docker and brings the services up, plus
 * an inventory grouping hosts by the kinds of services the project runs.
 */

import { stringify } from "yaml";
import type { GeneratedFile, ProjectConfig, ServiceConfig } from "../types/project.js";
import type { ValidationCollector } from "../utils/validation.js";
import { BaseGenerator } from "./base.js";
import { formatPortMapping, formatVolumeMapping } from "./format.js";
import { RenderError } from "../utils/errors.js";
import { sortedEntries, toIdentifier } from "../utils/strings.js";

const DEPLOY_DIR = "/opt/{{ project_name }}";

const WEB_SERVICE_TYPES = ["web", "frontend", "nginx"];
const DATABASE_SERVICE_TYPES = ["database", "postgres", "mysql", "mongo"];

/**
 * A playbook task: a display name plus exactly one module invocation
 */
export interface AnsibleTask {
  name: string;
  module: string;
  args: Record<string, string | boolean>;
}

type VarValue = string | boolean | string[];

interface InventoryGroup {
  hosts: Record<string, { ansible_host: string; ansible_user: string }>;
}

/**
 * True when any service type contains one of the markers, case-insensitively
 */
export function hasServiceType(services: ServiceConfig[], markers: string[]): boolean {
  return services.some((service) => {
    const type = service.type.toLowerCase();
    return markers.some((marker) => type.includes(marker.toLowerCase()));
  });
}

/**
 * Ansible generator
 */
export class AnsibleGenerator extends BaseGenerator {
  readonly target = "ansible" as const;

  protected override checkTarget(config: ProjectConfig, errors: ValidationCollector): void {
    config.services.forEach((service, i) => {
      service.volumes.forEach((volume, j) => {
        if (volume.source === "") {
          errors.add(`services[${i}].volumes[${j}].source`, "volume source is required", "");
        }
      });
    });
  }

  protected render(config: ProjectConfig): GeneratedFile[] {
    const files = [
      this.file("playbook.yml", this.generatePlaybook(config)),
      this.file("inventory.yml", this.generateInventory(config)),
    ];

    const requirements = this.generateRequirements();
    if (requirements !== null) {
      files.push(this.file("requirements.yml", requirements));
    }

    return files;
  }

  /**
   * Generate the playbook: one play against all hosts
   */
  generatePlaybook(config: ProjectConfig): string {
    const play: Record<string, unknown> = {
      hosts: "all",
      become: true,
      name: `Deploy ${config.name}`,
    };

    const vars = this.generateVars(config);
    if (Object.keys(vars).length > 0) {
      play["vars"] = vars;
    }

    play["tasks"] = this.generateTasks(config).map((task) => ({
      name: task.name,
      [task.module]: task.args,
    }));

    return "---\n" + this.serialize([play], "playbook.yml");
  }

  /**
   * Project variables followed by per-service image, ports, volumes and enabled flag
   */
  generateVars(config: ProjectConfig): Record<string, VarValue> {
    const vars: Record<string, VarValue> = {};

    for (const [key, value] of sortedEntries(config.variables)) {
      vars[key] = value;
    }

    for (const service of config.services) {
      const prefix = toIdentifier(service.name);
      vars[`${prefix}_image`] = service.image ?? "";
      vars[`${prefix}_ports`] = service.ports.map(formatPortMapping);
      vars[`${prefix}_volumes`] = service.volumes.map((volume) => formatVolumeMapping(volume));
      vars[`${prefix}_enabled`] = service.enabled;
    }

    return vars;
  }

  /**
   * Host setup, per-service preparation, then deployment
   */
  generateTasks(config: ProjectConfig): AnsibleTask[] {
    const tasks: AnsibleTask[] = [
      { name: "Update package cache", module: "apt", args: { update_cache: true } },
      { name: "Install Docker", module: "package", args: { name: "docker.io", state: "present" } },
      {
        name: "Start and enable Docker service",
        module: "systemd",
        args: { name: "docker", state: "started", enabled: true },
      },
    ];

    for (const service of config.services) {
      if (!service.enabled) continue;

      for (const volume of service.volumes) {
        if (!volume.source.startsWith("/")) {
          tasks.push({
            name: `Create directory for ${volume.source} volume`,
            module: "file",
            args: { path: volume.source, state: "directory" },
          });
        }
      }

      if (service.image) {
        tasks.push({
          name: `Pull ${service.name} Docker image`,
          module: "docker_image",
          args: { name: service.image, source: "pull" },
        });
      }
    }

    tasks.push(
      {
        name: "Create deployment directory",
        module: "file",
        args: { path: DEPLOY_DIR, state: "directory" },
      },
      {
        name: "Deploy services with Docker Compose",
        module: "docker_compose",
        args: { project_src: DEPLOY_DIR, state: "present" },
      },
    );

    return tasks;
  }

  /**
   * Generate the inventory with web and database groups when the project needs them
   */
  generateInventory(config: ProjectConfig): string {
    const children: Record<string, InventoryGroup> = {};

    if (hasServiceType(config.services, WEB_SERVICE_TYPES)) {
      children["webservers"] = this.placeholderGroup("webserver1", "webserver_ip");
    }

    if (hasServiceType(config.services, DATABASE_SERVICE_TYPES)) {
      children["databases"] = this.placeholderGroup("database1", "database_ip");
    }

    const vars: Record<string, string> = {
      project_name: config.name,
      environment: config.environment ?? "",
    };
    for (const [key, value] of sortedEntries(config.variables)) {
      vars[key] = value;
    }

    return this.serialize({ all: { children, vars } }, "inventory.yml");
  }

  /**
   * Collection and role requirements. Reserved: tasks use short module names,
   * so no requirements file is emitted.
   */
  generateRequirements(): string | null {
    return null;
  }

  private placeholderGroup(host: string, addressVar: string): InventoryGroup {
    return {
      hosts: {
        [host]: {
          ansible_host: `{{ ${addressVar} | default('127.0.0.1') }}`,
          ansible_user: "{{ ansible_user | default('ubuntu') }}",
        },
      },
    };
  }

  private serialize(value: unknown, document: string): string {
    try {
      return stringify(value, { lineWidth: 0 });
    } catch (error) {
      throw new RenderError(`failed to serialize ${document}`, {
        target: this.target,
        document,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }
}

/**
 * Create an Ansible generator
 */
export function createAnsibleGenerator(): AnsibleGenerator {
  return new AnsibleGenerator();
}
