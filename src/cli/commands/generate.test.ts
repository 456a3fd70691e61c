/**
 * Tests for generate command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import * as p from "@clack/prompts";
import { runGenerate } from "./generate.js";
import { runInit } from "./init.js";
import { ConfigError } from "../../utils/errors.js";

vi.mock("@clack/prompts", () => ({
  log: {
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    step: vi.fn(),
  },
}));

const OUT_OF_RANGE_PROJECT = `name: edge
type: web-app
services:
  - name: api
    type: backend
    image: node:18
    ports:
      - container: 70000
created_at: 2026-01-01T00:00:00Z
updated_at: 2026-01-01T00:00:00Z
`;

describe("runGenerate", () => {
  let dir: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "infragen-generate-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should write one target's files", async () => {
    await runInit("web-app", { name: "shop", cwd: dir });

    const result = await runGenerate("docker", { cwd: dir, output: "out" });

    expect(result.success).toBe(true);
    expect(result.written).toEqual([
      path.join(dir, "out", "docker-compose.yml"),
      path.join(dir, "out", ".env"),
    ]);
    expect(await fs.readFile(path.join(dir, "out", ".env"), "utf-8")).toBe(
      "DATABASE_POSTGRES_PASSWORD=changeme\n",
    );
  });

  it("should generate every configured target for all", async () => {
    await runInit("web-app", { name: "shop", cwd: dir });

    const result = await runGenerate("all", { cwd: dir });

    expect(result.outcomes.map((o) => o.target)).toEqual(["docker", "ansible", "terraform"]);
    expect(result.written.map((f) => path.basename(f))).toEqual([
      "docker-compose.yml",
      ".env",
      "playbook.yml",
      "inventory.yml",
      "main.tf",
      "variables.tf",
      "outputs.tf",
      "provider.tf",
    ]);
  });

  it("should honour the targets in the settings file", async () => {
    await fs.writeFile(path.join(dir, ".infragen.json"), '{"targets": ["ansible"]}');
    await runInit("web-app", { name: "shop", cwd: dir });

    const result = await runGenerate("all", { cwd: dir });

    expect(result.outcomes.map((o) => o.target)).toEqual(["ansible"]);
  });

  it("should report a failing target and still write the others", async () => {
    await fs.writeFile(path.join(dir, "edge.yml"), OUT_OF_RANGE_PROJECT);

    const result = await runGenerate("all", { cwd: dir, config: "edge.yml" });

    expect(result.success).toBe(false);
    expect(result.outcomes.map((o) => o.success)).toEqual([true, true, false]);
    expect(result.written).toHaveLength(3);
    expect(p.log.warn).toHaveBeenCalledWith("1 of 3 target(s) failed");
  });

  it("should reject unknown targets", async () => {
    await expect(runGenerate("kubernetes", { cwd: dir })).rejects.toThrow(
      new ConfigError("Unknown target 'kubernetes'"),
    );
  });
});
