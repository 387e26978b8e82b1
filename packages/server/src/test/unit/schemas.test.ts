/**
 * Unit tests for Zod schemas
 */

import { describe, it, expect } from "vitest";
import {
  CreateSequenceInputSchema,
  IdSchema,
  ListSequencesInputSchema,
  MetadataSchema,
  SearchExpressionInputSchema,
  SearchSequencesInputSchema,
  SequenceSnippetInputSchema,
  SymbolsSchema,
} from "../../schemas.js";

describe("SymbolsSchema", () => {
  it("should accept non-empty symbols", () => {
    expect(SymbolsSchema.parse("ACGT")).toBe("ACGT");
  });

  it("should reject empty symbols", () => {
    expect(() => SymbolsSchema.parse("")).toThrow(/must not be empty/);
  });

  it("should reject whitespace", () => {
    expect(() => SymbolsSchema.parse("AC GT")).toThrow(/must not contain whitespace/);
    expect(() => SymbolsSchema.parse("ACGT\n")).toThrow(/must not contain whitespace/);
  });
});

describe("IdSchema", () => {
  it("should accept positive integers", () => {
    expect(IdSchema.parse(1)).toBe(1);
  });

  it("should reject zero, fractions and strings", () => {
    expect(() => IdSchema.parse(0)).toThrow();
    expect(() => IdSchema.parse(1.5)).toThrow();
    expect(() => IdSchema.parse("1")).toThrow();
  });
});

describe("MetadataSchema", () => {
  it("should accept name and tags", () => {
    expect(MetadataSchema.parse({ name: "probe", tags: ["a", "b"] })).toEqual({
      name: "probe",
      tags: ["a", "b"],
    });
  });

  it("should reject unknown fields", () => {
    expect(() => MetadataSchema.parse({ owner: "x" })).toThrow(/Unrecognized key/);
  });

  it("should reject duplicate tags", () => {
    expect(() => MetadataSchema.parse({ tags: ["a", "a"] })).toThrow(/tags must be distinct/);
  });

  it("should reject names over 200 characters", () => {
    expect(() => MetadataSchema.parse({ name: "n".repeat(201) })).toThrow();
  });
});

describe("CreateSequenceInputSchema", () => {
  it("should make metadata optional", () => {
    expect(CreateSequenceInputSchema.parse({ symbols: "ACGT" })).toEqual({ symbols: "ACGT" });
  });
});

describe("ListSequencesInputSchema", () => {
  it("should apply defaults", () => {
    expect(ListSequencesInputSchema.parse({})).toEqual({ offset: 0, limit: 50 });
  });

  it("should reject limit > 1000", () => {
    expect(() => ListSequencesInputSchema.parse({ limit: 1001 })).toThrow(/cannot exceed 1000/);
  });
});

describe("SearchSequencesInputSchema", () => {
  it("should default to contains mode and limit 100", () => {
    expect(SearchSequencesInputSchema.parse({ pattern: "ACG" })).toEqual({
      pattern: "ACG",
      mode: "contains",
      limit: 100,
    });
  });

  it("should reject unknown modes", () => {
    expect(() => SearchSequencesInputSchema.parse({ pattern: "ACG", mode: "regex" })).toThrow();
  });

  it("should reject thresholds outside [0, 1]", () => {
    expect(() => SearchSequencesInputSchema.parse({ pattern: "ACG", threshold: 1.5 })).toThrow();
  });
});

describe("SearchExpressionInputSchema", () => {
  it("should reject an empty expression", () => {
    expect(() => SearchExpressionInputSchema.parse({ expression: "" })).toThrow(/must not be empty/);
  });
});

describe("SequenceSnippetInputSchema", () => {
  it("should keep optional markers", () => {
    expect(SequenceSnippetInputSchema.parse({ id: 3, pattern: "GT", open: "<", close: ">" })).toEqual({
      id: 3,
      pattern: "GT",
      open: "<",
      close: ">",
    });
  });

  it("should reject negative widths", () => {
    expect(() => SequenceSnippetInputSchema.parse({ id: 3, pattern: "GT", width: -1 })).toThrow();
  });
});
