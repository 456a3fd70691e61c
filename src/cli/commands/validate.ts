/**
 * Validate command - Check the project file against each target's rules
 */

import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import type { TargetKind } from "../../types/project.js";
import { getGenerator } from "../../generators/registry.js";
import { loadProject } from "../../project/persistence.js";
import {
  collectRecommendations,
  validateProject,
  type Recommendation,
} from "../../project/validate.js";
import { formatError, isInfragenError } from "../../utils/errors.js";
import { createCommandContext, resolveProjectFile } from "../context.js";
import { resolveTargets } from "./generate.js";

export interface ValidateOptions {
  config?: string;
  target?: string;
  cwd?: string;
}

export interface TargetCheck {
  target: TargetKind;
  valid: boolean;
  message?: string;
}

export interface ValidateResult {
  checks: TargetCheck[];
  recommendations: Recommendation[];
  valid: boolean;
}

export function registerValidateCommand(program: Command): void {
  program
    .command("validate")
    .description("Validate the project file")
    .option("-c, --config <path>", "Project file to read")
    .option("-t, --target <target>", "Target to validate: all, docker, ansible or terraform", "all")
    .action(async (options: ValidateOptions) => {
      try {
        const result = await runValidate({ ...options, cwd: process.cwd() });
        if (!result.valid) {
          process.exit(1);
        }
      } catch (error) {
        p.log.error(formatError(error));
        process.exit(1);
      }
    });
}

/**
 * Run validate command programmatically
 */
export async function runValidate(options: ValidateOptions = {}): Promise<ValidateResult> {
  const context = await createCommandContext(options.cwd);
  const targets = resolveTargets(context, options.target ?? "all");
  const config = await loadProject(resolveProjectFile(context, options.config));

  validateProject(config);

  const checks = targets.map((target): TargetCheck => {
    try {
      getGenerator(target).validate(config);
      return { target, valid: true };
    } catch (error) {
      if (!isInfragenError(error)) throw error;
      return { target, valid: false, message: error.message };
    }
  });

  for (const check of checks) {
    if (check.valid) {
      p.log.success(`${chalk.bold(check.target)}: valid`);
    } else {
      p.log.error(`${chalk.bold(check.target)}: ${check.message ?? "invalid"}`);
    }
  }

  const recommendations = collectRecommendations(config);
  if (recommendations.length > 0) {
    p.log.info(chalk.bold("Recommendations:"));
    for (const recommendation of recommendations) {
      const label =
        recommendation.severity === "security" ? chalk.red("security") : chalk.yellow("warning");
      console.log(`  ${label} ${recommendation.message}`);
    }
  }

  return { checks, recommendations, valid: checks.every((check) => check.valid) };
}
