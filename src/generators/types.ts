/**
 * Generator contract
 *
 * Every target implements the same three operations. `generate` is pure:
 * it returns file records and leaves writing them to the caller.
 */

import type { GeneratedFile, ProjectConfig, TargetKind } from "../types/project.js";
import type { InfragenError } from "../utils/errors.js";

export interface Generator {
  /** Fixed identifier of the target this generator renders */
  readonly target: TargetKind;

  /**
   * Check the project against the target's structural requirements.
   * Throws a ProjectValidationError listing every problem found.
   */
  validate(config: ProjectConfig): void;

  /**
   * Validate, then render the target's files in a stable order
   */
  generate(config: ProjectConfig): GeneratedFile[];
}

/**
 * Result of generating one target as part of a multi-target run
 */
export type TargetOutcome =
  | { target: TargetKind; success: true; files: GeneratedFile[] }
  | { target: TargetKind; success: false; error: InfragenError };
