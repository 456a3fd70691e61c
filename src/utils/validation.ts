/**
 * Validation utilities for infragen
 */

import { z } from "zod";
import {
  ConfigError,
  ProjectValidationError,
  type ConfigIssue,
  type FieldError,
} from "./errors.js";
import type { TargetKind } from "../types/project.js";

/**
 * Accumulates field errors over one validation pass.
 *
 * A collector belongs to exactly one pass: create it, thread it through the
 * checks, then call `throwIfAny`. Checks never stop at the first problem.
 */
export class ValidationCollector {
  private readonly errors: FieldError[] = [];

  constructor(private readonly target?: TargetKind) {}

  add(field: string, message: string, value: unknown): this {
    this.errors.push({ field, message, value });
    return this;
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  /**
   * Errors recorded so far, in the order added
   */
  list(): readonly FieldError[] {
    return [...this.errors];
  }

  toError(): ProjectValidationError {
    return new ProjectValidationError(this.list(), { target: this.target });
  }

  throwIfAny(): void {
    if (this.hasErrors()) {
      throw this.toError();
    }
  }
}

/**
 * Safe validate (returns result instead of throwing)
 */
export function safeValidate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
): { success: true; data: T } | { success: false; issues: ConfigIssue[] } {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  const issues: ConfigIssue[] = result.error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));

  return { success: false, issues };
}

/**
 * Validate a parsed document against a schema, raising ConfigError on mismatch
 */
export function validateDocument<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  context: { description: string; configPath?: string },
): T {
  const result = safeValidate(schema, data);
  if (result.success) {
    return result.data;
  }

  throw new ConfigError(`Invalid ${context.description}`, {
    issues: result.issues,
    configPath: context.configPath,
  });
}
