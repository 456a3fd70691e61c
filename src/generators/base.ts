/**
 * Base generator
 *
 * Holds the validate-then-render flow every target shares.
 */

import type { Logger, ILogObj } from "tslog";
import type { GeneratedFile, ProjectConfig, TargetKind } from "../types/project.js";
import type { Generator } from "./types.js";
import { checkProjectStructure } from "./validation.js";
import { ValidationCollector } from "../utils/validation.js";
import { InfragenError, RenderError } from "../utils/errors.js";
import { createChildLogger, getLogger, logTiming } from "../utils/logger.js";

export abstract class BaseGenerator implements Generator {
  abstract readonly target: TargetKind;

  private cachedLogger?: Logger<ILogObj>;

  protected get logger(): Logger<ILogObj> {
    this.cachedLogger ??= createChildLogger(getLogger(), this.target);
    return this.cachedLogger;
  }

  validate(config: ProjectConfig): void {
    const errors = new ValidationCollector(this.target);
    checkProjectStructure(config, errors);
    this.checkTarget(config, errors);
    errors.throwIfAny();
  }

  generate(config: ProjectConfig): GeneratedFile[] {
    this.validate(config);

    const files = logTiming(this.logger, `render ${this.target}`, () => {
      try {
        return this.render(config);
      } catch (error) {
        if (error instanceof InfragenError) {
          throw error;
        }
        throw new RenderError(`failed to render ${this.target} files`, {
          target: this.target,
          document: "unknown",
          cause: error instanceof Error ? error : undefined,
        });
      }
    });

    this.logger.debug({
      project: config.name,
      services: config.services.length,
      files: files.map((f) => f.path),
    });
    return files;
  }

  /**
   * Target-specific checks on top of the shared structure checks
   */
  protected checkTarget(_config: ProjectConfig, _errors: ValidationCollector): void {}

  protected abstract render(config: ProjectConfig): GeneratedFile[];

  protected file(path: string, content: string): GeneratedFile {
    return { path, content, target: this.target, encoding: "utf-8" };
  }
}
