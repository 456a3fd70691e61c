/**
 * Tests for file utilities
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { GeneratedFile } from "../types/project.js";

const mockFs = {
  mkdir: vi.fn().mockResolvedValue(undefined),
  access: vi.fn().mockResolvedValue(undefined),
  writeFile: vi.fn().mockResolvedValue(undefined),
};

vi.mock("node:fs/promises", () => ({
  default: mockFs,
}));

function generated(path: string, content: string): GeneratedFile {
  return { path, content, target: "docker", encoding: "utf-8" };
}

describe("ensureDir", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should create directory with recursive flag", async () => {
    const { ensureDir } = await import("./files.js");

    await ensureDir("/test/nested/dir");

    expect(mockFs.mkdir).toHaveBeenCalledWith("/test/nested/dir", { recursive: true });
  });

  it("should throw FileSystemError on failure", async () => {
    mockFs.mkdir.mockRejectedValueOnce(new Error("Permission denied"));

    const { ensureDir } = await import("./files.js");

    await expect(ensureDir("/test")).rejects.toThrow("Failed to create directory: /test");
  });
});

describe("fileExists", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should return true when access succeeds", async () => {
    const { fileExists } = await import("./files.js");

    expect(await fileExists("/test/file.yml")).toBe(true);
  });

  it("should return false when access fails", async () => {
    mockFs.access.mockRejectedValueOnce(new Error("ENOENT"));

    const { fileExists } = await import("./files.js");

    expect(await fileExists("/missing.yml")).toBe(false);
  });
});

describe("writeGeneratedFiles", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should write each file under the output directory", async () => {
    const { writeGeneratedFiles } = await import("./files.js");

    const written = await writeGeneratedFiles("/out", [
      generated("docker-compose.yml", "services:\n"),
      generated(".env", "A=1\n"),
    ]);

    expect(written).toEqual(["/out/docker-compose.yml", "/out/.env"]);
    expect(mockFs.mkdir).toHaveBeenCalledWith("/out", { recursive: true });
    expect(mockFs.writeFile).toHaveBeenNthCalledWith(
      1,
      "/out/docker-compose.yml",
      "services:\n",
      "utf-8",
    );
    expect(mockFs.writeFile).toHaveBeenNthCalledWith(2, "/out/.env", "A=1\n", "utf-8");
  });

  it("should throw FileSystemError when a write fails", async () => {
    mockFs.writeFile.mockRejectedValueOnce(new Error("EACCES"));

    const { writeGeneratedFiles } = await import("./files.js");

    await expect(writeGeneratedFiles("/out", [generated("main.tf", "")])).rejects.toThrow(
      "Failed to write file: /out/main.tf",
    );
  });
});
