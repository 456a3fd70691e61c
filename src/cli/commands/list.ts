/**
 * List command - Show presets, preset categories or the project's services
 */

import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { listCategories } from "../../presets/catalog.js";
import { loadProject } from "../../project/persistence.js";
import { ConfigError, formatError } from "../../utils/errors.js";
import { pluralize } from "../../utils/strings.js";
import { createCommandContext, loadCatalog, resolveProjectFile } from "../context.js";

export type ListSubject = "presets" | "categories" | "project";

const LIST_SUBJECTS: readonly ListSubject[] = ["presets", "categories", "project"];

export interface ListOptions {
  config?: string;
  cwd?: string;
}

export function registerListCommand(program: Command): void {
  program
    .command("list")
    .description("List presets, preset categories or project services")
    .argument("[subject]", "What to list: presets, categories or project", "presets")
    .option("-c, --config <path>", "Project file to read when listing the project")
    .action(async (subject: string, options: ListOptions) => {
      try {
        await runList(subject, { ...options, cwd: process.cwd() });
      } catch (error) {
        p.log.error(formatError(error));
        process.exit(1);
      }
    });
}

function isListSubject(value: string): value is ListSubject {
  return LIST_SUBJECTS.some((subject) => subject === value);
}

/**
 * Run list command programmatically, returning the printed lines
 */
export async function runList(subject: string, options: ListOptions = {}): Promise<string[]> {
  if (!isListSubject(subject)) {
    throw new ConfigError(`Unknown list subject '${subject}'`, {
      issues: [{ path: "subject", message: "expected presets, categories or project" }],
    });
  }

  const context = await createCommandContext(options.cwd);
  const lines: string[] = [];

  switch (subject) {
    case "presets": {
      const catalog = await loadCatalog(context);
      p.log.info(chalk.bold("Available presets:"));
      for (const preset of catalog.listPresets()) {
        lines.push(`${preset.id} - ${preset.name}: ${preset.description} [${preset.category}]`);
      }
      break;
    }
    case "categories": {
      const catalog = await loadCatalog(context);
      p.log.info(chalk.bold("Preset categories:"));
      for (const { category, count } of listCategories(catalog)) {
        lines.push(`${category} (${count} ${pluralize("preset", count)})`);
      }
      break;
    }
    case "project": {
      const config = await loadProject(resolveProjectFile(context, options.config));
      p.log.info(chalk.bold(`Project: ${config.name} (${config.type})`));
      for (const service of config.services) {
        const status = service.enabled ? "enabled" : "disabled";
        lines.push(`${service.name} [${service.type}] ${service.image ?? "-"} (${status})`);
      }
      break;
    }
  }

  for (const line of lines) {
    console.log(`  ${line}`);
  }
  return lines;
}
