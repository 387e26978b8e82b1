import { describe, it, expect } from "vitest";
import { buildSnippet, findOccurrences } from "./snippet.js";

const brackets = { width: 2, open: "[", close: "]" };

describe("findOccurrences", () => {
  it("should find non-overlapping occurrences", () => {
    expect(findOccurrences("AAAA", "AA")).toEqual([0, 2]);
    expect(findOccurrences("ACGT", "TT")).toEqual([]);
  });
});

describe("buildSnippet", () => {
  it("should mark the first occurrence and cuts the right side", () => {
    expect(buildSnippet(1, "TTACGGACGT", "TTACGGACGT", "ACG", brackets)).toEqual({
      id: 1,
      excerpt: "TT[ACG]GA...",
      position: 2,
      occurrences: 2,
    });
  });

  it("should mark every occurrence inside the window", () => {
    const snippet = buildSnippet(1, "TTACGGACGT", "TTACGGACGT", "ACG", { ...brackets, width: 10 });

    expect(snippet.excerpt).toBe("TT[ACG]G[ACG]T");
  });

  it("should cut the left side", () => {
    expect(buildSnippet(1, "GGGGGGACGT", "GGGGGGACGT", "ACG", brackets).excerpt).toBe("...GG[ACG]T");
  });

  it("should return the head of the sequence when the pattern is absent", () => {
    expect(buildSnippet(4, "ACGTACGTAC", "ACGTACGTAC", "TTT", { ...brackets, width: 3 })).toEqual({
      id: 4,
      excerpt: "ACGTAC...",
      position: -1,
      occurrences: 0,
    });
  });

  it("should render the original symbols at normalized offsets", () => {
    expect(buildSnippet(2, "acgTT", "ACGTT", "GT", { ...brackets, width: 1 }).excerpt).toBe("...c[gT]T");
  });

  it("should use custom markers", () => {
    const snippet = buildSnippet(1, "ACGT", "ACGT", "CG", { width: 5, open: "<mark>", close: "</mark>" });

    expect(snippet.excerpt).toBe("A<mark>CG</mark>T");
  });
});
