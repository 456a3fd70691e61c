/**
 * Init command - Create a project file from a preset
 */

import path from "node:path";
import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import type { ProjectConfig } from "../../types/project.js";
import { createProjectFromPreset } from "../../presets/bootstrap.js";
import { saveProject } from "../../project/persistence.js";
import { ConfigError, formatError } from "../../utils/errors.js";
import { fileExists } from "../../utils/files.js";
import { createCommandContext, loadCatalog, resolveOutputDir } from "../context.js";

export interface InitOptions {
  name: string;
  environment?: string;
  output?: string;
  force?: boolean;
  cwd?: string;
}

export interface InitResult {
  config: ProjectConfig;
  configFile: string;
}

export function registerInitCommand(program: Command): void {
  program
    .command("init")
    .description("Initialize a new project from a preset")
    .argument("<preset>", "Preset to start from (see 'infragen list presets')")
    .requiredOption("-n, --name <name>", "Project name")
    .option("-e, --environment <environment>", "Environment label", "development")
    .option("-o, --output <dir>", "Directory to write the project file to")
    .option("-f, --force", "Overwrite an existing project file")
    .action(async (presetId: string, options: InitOptions) => {
      try {
        await runInit(presetId, { ...options, cwd: process.cwd() });
      } catch (error) {
        p.log.error(formatError(error));
        process.exit(1);
      }
    });
}

/**
 * Run init command programmatically
 */
export async function runInit(presetId: string, options: InitOptions): Promise<InitResult> {
  const context = await createCommandContext(options.cwd);
  const catalog = await loadCatalog(context);

  const preset = catalog.getPreset(presetId);
  const config = createProjectFromPreset(
    catalog,
    presetId,
    options.name,
    options.environment ?? "development",
  );

  const configFile = path.join(
    resolveOutputDir(context, options.output ?? "."),
    context.settings.projectFile,
  );

  if (!options.force && (await fileExists(configFile))) {
    throw new ConfigError(`Project file already exists: ${configFile}`, {
      configPath: configFile,
    });
  }

  await saveProject(config, configFile);

  p.log.success(`Project '${config.name}' initialized successfully!`);
  p.log.info(`Configuration saved to: ${configFile}`);
  p.log.info(`Preset: ${preset.name} - ${preset.description}`);
  p.log.info(`Services: ${config.services.length}`);

  console.log("\nNext steps:");
  for (const target of context.settings.targets) {
    console.log(chalk.dim("  ") + chalk.cyan(`infragen generate ${target}`));
  }

  return { config, configFile };
}
