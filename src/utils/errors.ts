/**
 * Error handling for infragen
 * Custom error types with context and recovery information
 */

import type { TargetKind } from "../types/project.js";

/**
 * Base error class for infragen
 */
export class InfragenError extends Error {
  readonly code: string;
  readonly context: Record<string, unknown>;
  readonly recoverable: boolean;
  readonly suggestion?: string;

  constructor(
    message: string,
    options: {
      code: string;
      context?: Record<string, unknown>;
      recoverable?: boolean;
      suggestion?: string;
      cause?: Error;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = "InfragenError";
    this.code = options.code;
    this.context = options.context ?? {};
    this.recoverable = options.recoverable ?? false;
    this.suggestion = options.suggestion;

    Error.captureStackTrace(this, InfragenError);
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      recoverable: this.recoverable,
      suggestion: this.suggestion,
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * A single field-level validation failure
 */
export interface FieldError {
  field: string;
  message: string;
  value: unknown;
}

/**
 * Render one field error the way it appears in aggregated messages
 */
export function describeFieldError(error: FieldError): string {
  return `validation error on field '${error.field}': ${error.message}`;
}

/**
 * Aggregated result of a validation pass that found problems.
 *
 * Carries every violation the pass recorded, in the order they were found.
 */
export class ProjectValidationError extends InfragenError {
  readonly errors: readonly FieldError[];

  constructor(errors: readonly FieldError[], options: { target?: TargetKind } = {}) {
    super(formatFieldErrors(errors), {
      code: "VALIDATION_ERROR",
      context: { target: options.target, fields: errors.map((e) => e.field) },
      recoverable: true,
      suggestion: "Fix the listed fields in the project file and run the command again",
    });
    this.name = "ProjectValidationError";
    this.errors = errors;
  }
}

function formatFieldErrors(errors: readonly FieldError[]): string {
  if (errors.length === 0) {
    return "no validation errors";
  }
  const lines = errors.map((error, i) => `${i + 1}. ${describeFieldError(error)}`);
  return `${errors.length} validation error(s):\n${lines.join("\n")}`;
}

/**
 * Unknown preset identifier
 */
export class PresetNotFoundError extends InfragenError {
  readonly presetId: string;

  constructor(presetId: string) {
    super(`preset '${presetId}' not found`, {
      code: "PRESET_NOT_FOUND",
      context: { presetId },
      recoverable: false,
      suggestion: "Run 'infragen list presets' to see the available presets",
    });
    this.name = "PresetNotFoundError";
    this.presetId = presetId;
  }
}

/**
 * A serializer could not turn a validated model into text
 */
export class RenderError extends InfragenError {
  readonly target: TargetKind;
  readonly document: string;

  constructor(
    message: string,
    options: {
      target: TargetKind;
      document: string;
      cause?: Error;
    },
  ) {
    super(message, {
      code: "RENDER_ERROR",
      context: { target: options.target, document: options.document },
      recoverable: false,
      cause: options.cause,
    });
    this.name = "RenderError";
    this.target = options.target;
    this.document = options.document;
  }
}

/**
 * Configuration error
 */
export class ConfigError extends InfragenError {
  readonly issues: ConfigIssue[];

  constructor(
    message: string,
    options: {
      issues?: ConfigIssue[];
      configPath?: string;
      cause?: Error;
    } = {},
  ) {
    super(message, {
      code: "CONFIG_ERROR",
      context: { configPath: options.configPath, issues: options.issues },
      recoverable: true,
      suggestion: options.configPath
        ? `Check ${options.configPath} for errors`
        : "Check your configuration for errors",
      cause: options.cause,
    });
    this.name = "ConfigError";
    this.issues = options.issues ?? [];
  }

  /**
   * Format issues as a readable string
   */
  formatIssues(): string {
    if (this.issues.length === 0) return "";
    return this.issues.map((i) => `  - ${i.path}: ${i.message}`).join("\n");
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * File system error
 */
export class FileSystemError extends InfragenError {
  constructor(
    message: string,
    options: {
      path: string;
      operation: "read" | "write";
      cause?: Error;
    },
  ) {
    super(message, {
      code: "FILESYSTEM_ERROR",
      context: { path: options.path, operation: options.operation },
      recoverable: false,
      suggestion: `Check that the path exists and you have permissions: ${options.path}`,
      cause: options.cause,
    });
    this.name = "FileSystemError";
  }
}

/**
 * Check if error is an infragen error
 */
export function isInfragenError(error: unknown): error is InfragenError {
  return error instanceof InfragenError;
}

/**
 * Default suggestions for common error codes.
 * Used as fallback when an error doesn't have a specific suggestion.
 */
export const ERROR_SUGGESTIONS: Record<string, string> = {
  VALIDATION_ERROR: "Run 'infragen validate' to see every problem with the project file.",
  PRESET_NOT_FOUND: "Run 'infragen list presets' to see the available presets.",
  RENDER_ERROR: "Rendering failed unexpectedly. Check the project values for unusual characters.",
  CONFIG_ERROR: "Check your project file or .infragen.json for errors.",
  FILESYSTEM_ERROR: "Check that the path exists and you have read/write permissions.",
  UNEXPECTED_ERROR: "An unexpected error occurred. Re-run with INFRAGEN_LOG_LEVEL=debug.",
};

/**
 * Format error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof InfragenError) {
    let message = `[${error.code}] ${error.message}`;
    if (error instanceof ConfigError && error.issues.length > 0) {
      message += `\n${error.formatIssues()}`;
    }
    const suggestion = error.suggestion ?? ERROR_SUGGESTIONS[error.code];
    if (suggestion) {
      message += `\n  Suggestion: ${suggestion}`;
    }
    return message;
  }

  if (error instanceof Error) {
    return `${error.message}\n  Suggestion: ${ERROR_SUGGESTIONS["UNEXPECTED_ERROR"]}`;
  }

  return String(error);
}
