/**
 * Tests for version lookup
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { VERSION, readPackageVersion } from "./version.js";

describe("readPackageVersion", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "infragen-version-"));
    await fs.mkdir(path.join(dir, "dist"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function moduleUrl(): string {
    return pathToFileURL(path.join(dir, "dist", "version.js")).href;
  }

  it("should read the version of this package", () => {
    expect(VERSION).toBe("0.1.0");
  });

  it("should read the manifest one level up", async () => {
    await fs.writeFile(
      path.join(dir, "package.json"),
      JSON.stringify({ name: "infragen", version: "2.3.4" }),
    );

    expect(readPackageVersion(moduleUrl())).toBe("2.3.4");
  });

  it("should ignore a manifest for another package", async () => {
    await fs.writeFile(
      path.join(dir, "package.json"),
      JSON.stringify({ name: "other", version: "9.9.9" }),
    );

    expect(readPackageVersion(moduleUrl())).toBe("0.0.0");
  });

  it("should fall back when there is no manifest", () => {
    expect(readPackageVersion(moduleUrl())).toBe("0.0.0");
  });
});
