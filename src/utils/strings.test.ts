/**
 * Tests for string utilities
 */

import { describe, it, expect } from "vitest";
import {
  sortedEntries,
  toIdentifier,
  hclString,
  escapeHclTemplate,
  shellQuote,
  indent,
  pluralize,
} from "./strings.js";

describe("sortedEntries", () => {
  it("should order entries by key", () => {
    expect(sortedEntries({ b: "2", a: "1", C: "3" })).toEqual([
      ["C", "3"],
      ["a", "1"],
      ["b", "2"],
    ]);
  });
});

describe("toIdentifier", () => {
  it("should replace hyphens with underscores", () => {
    expect(toIdentifier("api-gateway")).toBe("api_gateway");
    expect(toIdentifier("model-server-v2")).toBe("model_server_v2");
  });
});

describe("hclString", () => {
  it("should quote plain text", () => {
    expect(hclString("web")).toBe('"web"');
  });

  it("should escape quotes and backslashes", () => {
    expect(hclString('say "hi"\\now')).toBe('"say \\"hi\\"\\\\now"');
  });

  it("should escape template sequences", () => {
    expect(hclString("${var.x} %{if}")).toBe('"$${var.x} %%{if}"');
  });
});

describe("escapeHclTemplate", () => {
  it("should leave lone dollar signs alone", () => {
    expect(escapeHclTemplate("cost $5")).toBe("cost $5");
  });
});

describe("shellQuote", () => {
  it("should leave safe words unquoted", () => {
    expect(shellQuote("db_data:/var/lib/postgresql/data")).toBe(
      "db_data:/var/lib/postgresql/data",
    );
    expect(shellQuote("POSTGRES_DB=webapp")).toBe("POSTGRES_DB=webapp");
  });

  it("should single-quote values with spaces or quotes", () => {
    expect(shellQuote("a b")).toBe("'a b'");
    expect(shellQuote("it's")).toBe(`'it'"'"'s'`);
  });
});

describe("indent", () => {
  it("should indent non-empty lines", () => {
    expect(indent("a\n\nb", 4)).toBe("    a\n\n    b");
  });
});

describe("pluralize", () => {
  it("should pluralize by count", () => {
    expect(pluralize("preset", 1)).toBe("preset");
    expect(pluralize("preset", 3)).toBe("presets");
    expect(pluralize("entry", 2, "entries")).toBe("entries");
  });
});
