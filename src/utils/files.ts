/**
 * File utilities for infragen
 */

import fs from "node:fs/promises";
import path from "node:path";
import { FileSystemError } from "./errors.js";
import type { GeneratedFile } from "../types/project.js";

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (error) {
    throw new FileSystemError(`Failed to create directory: ${dirPath}`, {
      path: dirPath,
      operation: "write",
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write generated files under an output directory, returning the written paths
 */
export async function writeGeneratedFiles(
  outputDir: string,
  files: readonly GeneratedFile[],
): Promise<string[]> {
  const written: string[] = [];

  for (const file of files) {
    const filePath = path.join(outputDir, file.path);
    await ensureDir(path.dirname(filePath));

    try {
      await fs.writeFile(filePath, file.content, file.encoding);
    } catch (error) {
      throw new FileSystemError(`Failed to write file: ${filePath}`, {
        path: filePath,
        operation: "write",
        cause: error instanceof Error ? error : undefined,
      });
    }
    written.push(filePath);
  }

  return written;
}
