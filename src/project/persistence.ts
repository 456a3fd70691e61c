/**
 * Project file persistence
 *
 * Reads and writes the YAML project file produced by `infragen init`.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { parse, stringify } from "yaml";
import type { ProjectConfig } from "../types/project.js";
import { ProjectFileSchema, toProjectDocument } from "./schema.js";
import { ConfigError, FileSystemError } from "../utils/errors.js";
import { validateDocument } from "../utils/validation.js";

/**
 * Serialize a project to YAML
 */
export function serializeProject(config: ProjectConfig): string {
  return stringify(toProjectDocument(config), { lineWidth: 0 });
}

/**
 * Parse YAML text into a project
 */
export function parseProject(content: string, configPath?: string): ProjectConfig {
  let document: unknown;
  try {
    document = parse(content);
  } catch (error) {
    throw new ConfigError("Project file is not valid YAML", {
      configPath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  return validateDocument(ProjectFileSchema, document, {
    description: "project file",
    configPath,
  });
}

/**
 * Save a project to a file, creating the parent directory
 */
export async function saveProject(config: ProjectConfig, filePath: string): Promise<void> {
  let content: string;
  try {
    content = serializeProject(config);
  } catch (error) {
    throw new ConfigError(`Failed to serialize project '${config.name}'`, {
      configPath: filePath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, "utf-8");
  } catch (error) {
    throw new FileSystemError(`Failed to write project file: ${filePath}`, {
      path: filePath,
      operation: "write",
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Load a project from a file
 */
export async function loadProject(filePath: string): Promise<ProjectConfig> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new FileSystemError(`Failed to read project file: ${filePath}`, {
      path: filePath,
      operation: "read",
      cause: error instanceof Error ? error : undefined,
    });
  }

  return parseProject(content, filePath);
}
