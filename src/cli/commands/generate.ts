/**
 * Generate command - Render infrastructure files for one target or all of them
 */

import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import type { TargetKind } from "../../types/project.js";
import type { TargetOutcome } from "../../generators/types.js";
import { generateTargets } from "../../generators/registry.js";
import { loadProject } from "../../project/persistence.js";
import { validateProject } from "../../project/validate.js";
import { TargetKindSchema } from "../../config/schema.js";
import { ConfigError, formatError } from "../../utils/errors.js";
import { writeGeneratedFiles } from "../../utils/files.js";
import {
  createCommandContext,
  resolveOutputDir,
  resolveProjectFile,
  type CommandContext,
} from "../context.js";

export interface GenerateOptions {
  config?: string;
  output?: string;
  cwd?: string;
}

export interface GenerateResult {
  outcomes: TargetOutcome[];
  written: string[];
  success: boolean;
}

export function registerGenerateCommand(program: Command): void {
  program
    .command("generate")
    .description("Generate infrastructure files")
    .argument("[target]", "Target to generate: all, docker, ansible or terraform", "all")
    .option("-c, --config <path>", "Project file to read")
    .option("-o, --output <dir>", "Directory to write generated files to")
    .action(async (target: string, options: GenerateOptions) => {
      try {
        const result = await runGenerate(target, { ...options, cwd: process.cwd() });
        if (!result.success) {
          process.exit(1);
        }
      } catch (error) {
        p.log.error(formatError(error));
        process.exit(1);
      }
    });
}

/**
 * Targets named by a command argument; "all" means every configured target
 */
export function resolveTargets(context: CommandContext, target: string): TargetKind[] {
  if (target === "all") {
    return [...context.settings.targets];
  }

  const parsed = TargetKindSchema.safeParse(target);
  if (!parsed.success) {
    throw new ConfigError(`Unknown target '${target}'`, {
      issues: [{ path: "target", message: "expected all, docker, ansible or terraform" }],
    });
  }
  return [parsed.data];
}

/**
 * Run generate command programmatically
 */
export async function runGenerate(
  target: string,
  options: GenerateOptions = {},
): Promise<GenerateResult> {
  const context = await createCommandContext(options.cwd);
  const targets = resolveTargets(context, target);
  const projectFile = resolveProjectFile(context, options.config);
  const outputDir = resolveOutputDir(context, options.output);

  const config = await loadProject(projectFile);
  validateProject(config);

  p.log.step(`Generating ${targets.join(", ")} files for '${config.name}'`);

  const outcomes = generateTargets(config, targets);
  const written: string[] = [];

  for (const outcome of outcomes) {
    if (!outcome.success) {
      p.log.error(`${chalk.bold(outcome.target)}: ${formatError(outcome.error)}`);
      continue;
    }

    const paths = await writeGeneratedFiles(outputDir, outcome.files);
    written.push(...paths);
    p.log.success(`${chalk.bold(outcome.target)}: ${outcome.files.length} file(s)`);
    for (const filePath of paths) {
      console.log(chalk.dim(`  ${filePath}`));
    }
  }

  const success = outcomes.every((outcome) => outcome.success);
  if (success) {
    p.log.success(`Generated ${written.length} file(s) in ${outputDir}`);
  } else {
    const failed = outcomes.filter((outcome) => !outcome.success).length;
    p.log.warn(`${failed} of ${outcomes.length} target(s) failed`);
  }

  return { outcomes, written, success };
}
