/**
 * Tests for the generator registry
 */

import { describe, it, expect } from "vitest";
import type { ProjectConfig } from "../types/project.js";
import { generateTargets, getGenerator } from "./registry.js";
import { AnsibleGenerator } from "./ansible.js";
import { ComposeGenerator } from "./compose.js";
import { TerraformGenerator } from "./terraform.js";
import { ProjectValidationError } from "../utils/errors.js";

function project(containerPort: number): ProjectConfig {
  return {
    name: "shop",
    type: "web-app",
    services: [
      {
        name: "api",
        type: "backend",
        image: "node:18",
        ports: [{ container: containerPort }],
        volumes: [],
        environment: {},
        dependsOn: [],
        enabled: true,
      },
    ],
    variables: {},
    createdAt: new Date("2026-01-01T00:00:00Z"),
    updatedAt: new Date("2026-01-01T00:00:00Z"),
  };
}

describe("getGenerator", () => {
  it("should map each target to its generator", () => {
    expect(getGenerator("docker")).toBeInstanceOf(ComposeGenerator);
    expect(getGenerator("ansible")).toBeInstanceOf(AnsibleGenerator);
    expect(getGenerator("terraform")).toBeInstanceOf(TerraformGenerator);
  });
});

describe("generateTargets", () => {
  it("should return one outcome per target in request order", () => {
    const outcomes = generateTargets(project(8080), ["terraform", "docker"]);

    expect(outcomes.map((o) => [o.target, o.success])).toEqual([
      ["terraform", true],
      ["docker", true],
    ]);
  });

  it("should leave the project untouched", () => {
    const config = project(8080);
    const [api] = config.services;
    if (api) {
      api.environment["API_KEY"] = "test-secret";
      api.volumes.push({ source: "./data", target: "/data", readOnly: true, type: "bind" });
    }
    const before = structuredClone(config);

    generateTargets(config, ["docker", "ansible", "terraform"]);

    expect(config).toEqual(before);
  });

  it("should keep going when one target fails", () => {
    const outcomes = generateTargets(project(70000), ["docker", "ansible", "terraform"]);

    expect(outcomes.map((o) => o.success)).toEqual([true, true, false]);

    const failed = outcomes[2];
    expect(failed?.success).toBe(false);
    if (failed && !failed.success) {
      expect(failed.error).toBeInstanceOf(ProjectValidationError);
      expect(failed.target).toBe("terraform");
    }

    const docker = outcomes[0];
    if (docker?.success) {
      expect(docker.files.map((f) => f.path)).toEqual(["docker-compose.yml"]);
    }
  });
});
