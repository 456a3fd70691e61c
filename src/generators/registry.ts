/**
 * Generator registry
 *
 * Maps each target to its generator and runs several targets in one request.
 */

import type { ProjectConfig, TargetKind } from "../types/project.js";
import type { Generator, TargetOutcome } from "./types.js";
import { AnsibleGenerator } from "./ansible.js";
import { ComposeGenerator } from "./compose.js";
import { TerraformGenerator } from "./terraform.js";
import { InfragenError } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

/**
 * Get the generator for a target
 */
export function getGenerator(target: TargetKind): Generator {
  switch (target) {
    case "docker":
      return new ComposeGenerator();
    case "ansible":
      return new AnsibleGenerator();
    case "terraform":
      return new TerraformGenerator();
  }
}

/**
 * Generate several targets independently.
 *
 * A target that fails is reported in its own outcome; the others still run.
 */
export function generateTargets(
  config: ProjectConfig,
  targets: readonly TargetKind[],
): TargetOutcome[] {
  const logger = getLogger();

  return targets.map((target): TargetOutcome => {
    try {
      const files = getGenerator(target).generate(config);
      return { target, success: true, files };
    } catch (error) {
      const wrapped =
        error instanceof InfragenError
          ? error
          : new InfragenError(`failed to generate ${target} files`, {
              code: "UNEXPECTED_ERROR",
              context: { target },
              cause: error instanceof Error ? error : undefined,
            });
      logger.warn({ target, code: wrapped.code, message: wrapped.message });
      return { target, success: false, error: wrapped };
    }
  });
}
