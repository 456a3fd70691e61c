/**
 * Tests for validation utilities
 */

import { describe, it, expect } from "vitest";
import { z } from "zod";
import { ValidationCollector, safeValidate, validateDocument } from "./validation.js";
import { ConfigError, ProjectValidationError } from "./errors.js";

describe("ValidationCollector", () => {
  it("should keep errors in the order added", () => {
    const errors = new ValidationCollector();
    errors.add("name", "project name is required", "").add("services", "empty", 0);

    expect(errors.hasErrors()).toBe(true);
    expect(errors.list().map((e) => e.field)).toEqual(["name", "services"]);
  });

  it("should not throw when empty", () => {
    const errors = new ValidationCollector();

    expect(errors.hasErrors()).toBe(false);
    expect(() => errors.throwIfAny()).not.toThrow();
  });

  it("should throw a ProjectValidationError tagged with the target", () => {
    const errors = new ValidationCollector("terraform");
    errors.add("services[0].ports[0].container", "out of range", 70000);

    let thrown: unknown;
    try {
      errors.throwIfAny();
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ProjectValidationError);
    if (thrown instanceof ProjectValidationError) {
      expect(thrown.context["target"]).toBe("terraform");
      expect(thrown.errors[0]?.value).toBe(70000);
    }
  });

  it("should return a copy from list", () => {
    const errors = new ValidationCollector();
    errors.add("name", "required", "");

    const snapshot = errors.list();
    errors.add("services", "empty", 0);

    expect(snapshot).toHaveLength(1);
  });
});

describe("safeValidate", () => {
  const schema = z.object({ port: z.number().default(80), host: z.string() });

  it("should return parsed data with defaults", () => {
    expect(safeValidate(schema, { host: "localhost" })).toEqual({
      success: true,
      data: { port: 80, host: "localhost" },
    });
  });

  it("should return issues with dotted paths", () => {
    const result = safeValidate(z.object({ nested: z.object({ value: z.string() }) }), {
      nested: { value: 1 },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.issues).toEqual([
        { path: "nested.value", message: "Expected string, received number" },
      ]);
    }
  });
});

describe("validateDocument", () => {
  it("should throw ConfigError naming the document", () => {
    expect(() =>
      validateDocument(z.object({ name: z.string() }), {}, { description: "settings" }),
    ).toThrow(new ConfigError("Invalid settings"));
  });
});
