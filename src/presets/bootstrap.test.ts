/**
 * Tests for the preset bootstrapper
 */

import { describe, it, expect } from "vitest";
import {
  DEFAULT_PROJECT_VERSION,
  createProjectFromPreset,
  projectTypeForPreset,
  serviceFromPreset,
} from "./bootstrap.js";
import { InMemoryPresetCatalog, getBundledCatalog } from "./catalog.js";
import { ComposeGenerator } from "../generators/compose.js";
import { PresetNotFoundError } from "../utils/errors.js";
import { serializeProject } from "../project/persistence.js";
import type { Preset } from "../types/project.js";

const now = new Date("2026-05-04T10:00:00.000Z");

describe("projectTypeForPreset", () => {
  it("should map known ids and fall back to web-app", () => {
    expect(projectTypeForPreset("ml")).toBe("ml");
    expect(projectTypeForPreset("infrastructure")).toBe("infrastructure");
    expect(projectTypeForPreset("static-site")).toBe("web-app");
  });

  it("should not resolve ids through the object prototype", () => {
    expect(projectTypeForPreset("constructor")).toBe("web-app");
    expect(projectTypeForPreset("to-string")).toBe("web-app");
    expect(projectTypeForPreset("__proto__")).toBe("web-app");
  });
});

describe("serviceFromPreset", () => {
  it("should start optional services disabled", () => {
    const service = serviceFromPreset({
      name: "loki",
      type: "logging",
      description: "Logs",
      ports: [],
      volumes: [],
      environment: {},
      dependsOn: [],
      optional: true,
    });

    expect(service.enabled).toBe(false);
  });
});

describe("createProjectFromPreset", () => {
  const catalog = getBundledCatalog();

  it("should instantiate the web-app preset", () => {
    const project = createProjectFromPreset(catalog, "web-app", "shop", "staging", now);

    expect(project.name).toBe("shop");
    expect(project.type).toBe("web-app");
    expect(project.version).toBe(DEFAULT_PROJECT_VERSION);
    expect(project.environment).toBe("staging");
    expect(project.description).toBe("Basic web application with frontend, backend, and database");
    expect(project.services.map((s) => s.name)).toEqual(["frontend", "api", "database"]);
    expect(project.services.every((s) => s.enabled)).toBe(true);
    expect(project.createdAt).toEqual(now);
    expect(project.updatedAt).toEqual(now);
    expect(project.createdAt).not.toBe(project.updatedAt);
  });

  it("should disable optional services and copy preset variables", () => {
    const project = createProjectFromPreset(catalog, "infrastructure", "ops", "production", now);

    expect(project.services.map((s) => [s.name, s.enabled])).toEqual([
      ["prometheus", true],
      ["grafana", true],
      ["loki", false],
    ]);
    expect(project.variables).toEqual({ RETENTION_DAYS: "15" });
  });

  it("should not share state with the catalog", () => {
    const project = createProjectFromPreset(catalog, "web-app", "shop", "dev", now);
    const [frontend] = project.services;
    frontend?.ports.push({ container: 443 });
    if (frontend) frontend.environment["EXTRA"] = "1";

    const again = createProjectFromPreset(catalog, "web-app", "shop", "dev", now);

    expect(again.services[0]?.ports).toEqual([{ host: 80, container: 80, protocol: "tcp" }]);
    expect(again.services[0]?.environment).toEqual({ REACT_APP_API_URL: "http://api:8080" });
  });

  it("should fall back to web-app for unknown preset ids", () => {
    const custom: Preset = {
      id: "static-site",
      name: "Static site",
      description: "Static files",
      category: "Web Applications",
      services: [],
      variables: {},
      tags: [],
    };

    const project = createProjectFromPreset(
      new InMemoryPresetCatalog([custom]),
      "static-site",
      "blog",
      "dev",
      now,
    );

    expect(project.type).toBe("web-app");
  });

  it("should bootstrap a serializable project from a preset named constructor", () => {
    const custom: Preset = {
      id: "constructor",
      name: "Builder",
      description: "Build tooling",
      category: "Tools",
      services: [],
      variables: {},
      tags: [],
    };

    const project = createProjectFromPreset(
      new InMemoryPresetCatalog([custom]),
      "constructor",
      "builder",
      "dev",
      now,
    );

    expect(project.type).toBe("web-app");
    expect(serializeProject(project)).toContain("type: web-app\n");
  });

  it("should throw PresetNotFoundError for unknown presets", () => {
    expect(() => createProjectFromPreset(catalog, "serverless", "x", "dev", now)).toThrow(
      PresetNotFoundError,
    );
  });

  it("should produce a project the compose generator renders end to end", () => {
    const project = createProjectFromPreset(catalog, "web-app", "shop", "staging", now);

    const files = new ComposeGenerator().generate(project);

    expect(files.map((f) => f.path)).toEqual(["docker-compose.yml", ".env"]);
    expect(files[0]?.content).toBe(
      [
        "services:",
        "  frontend:",
        "    image: nginx:alpine",
        "    ports:",
        '      - "80:80" # tcp',
        "    environment:",
        '      REACT_APP_API_URL: "http://api:8080"',
        "",
        "  api:",
        "    image: node:18-alpine",
        "    ports:",
        '      - "8080:8080" # tcp',
        "    environment:",
        '      DB_HOST: "database"',
        '      NODE_ENV: "development"',
        "    depends_on:",
        "      - database",
        "",
        "  database:",
        "    image: postgres:15",
        "    ports:",
        '      - "5432" # tcp',
        "    volumes:",
        "      - db_data:/var/lib/postgresql/data",
        "    environment:",
        '      POSTGRES_DB: "webapp"',
        '      POSTGRES_PASSWORD: "changeme"',
        '      POSTGRES_USER: "admin"',
        "",
        "volumes:",
        "  db_data:",
        "",
      ].join("\n"),
    );
    expect(files[1]?.content).toBe("DATABASE_POSTGRES_PASSWORD=changeme\n");
  });
});
