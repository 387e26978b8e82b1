import { describe, it, expect, beforeEach } from "vitest";
import { IndexInconsistencyError } from "../errors.js";
import { kmersOf } from "./kmer-index.js";
import { SequenceIndex } from "./sequence-index.js";

describe("kmersOf", () => {
  it("should return the distinct k-mers", () => {
    expect([...kmersOf("ACGACG", 3)]).toEqual(["ACG", "CGA", "GAC"]);
  });

  it("should return the whole string as a degenerate token when shorter than k", () => {
    expect([...kmersOf("AC", 3)]).toEqual(["AC"]);
  });
});

describe("SequenceIndex", () => {
  let index: SequenceIndex;

  beforeEach(() => {
    index = new SequenceIndex({ k: 3, caseSensitive: false });
    index.onCreate(1, "ACGTAC");
    index.onCreate(2, "TTACGG");
  });

  it("should build exact and k-mer tables", () => {
    expect(index.exactIds("ACGTAC")).toEqual([1]);
    expect([...index.postings("ACG")].sort()).toEqual([1, 2]);
    expect([...index.postings("CGT")]).toEqual([1]);
    expect(index.stats()).toEqual({ sequences: 2, kmers: 6, distinctContents: 2, totalSymbols: 12 });
  });

  it("should normalize content by folding case", () => {
    index.onCreate(3, "acgtac");

    expect(index.exactIds("ACGTAC")).toEqual([1, 3]);
    expect(index.symbolsOf(3)).toBe("ACGTAC");
  });

  it("should keep case when configured case-sensitive", () => {
    const sensitive = new SequenceIndex({ k: 3, caseSensitive: true });
    sensitive.onCreate(1, "acgt");

    expect(sensitive.exactIds("ACGT")).toEqual([]);
    expect(sensitive.exactIds("acgt")).toEqual([1]);
  });

  it("should index short sequences under one degenerate token", () => {
    index.onCreate(3, "TA");

    expect([...index.postings("TA")]).toEqual([3]);
    expect(index.shortIds()).toEqual([3]);
  });

  it("should remove every trace on delete", () => {
    index.onDelete(1, "ACGTAC");

    expect(index.has(1)).toBe(false);
    expect(index.exactIds("ACGTAC")).toEqual([]);
    expect([...index.postings("ACG")]).toEqual([2]);
    expect(index.postings("CGT").size).toBe(0);
    expect(index.stats()).toEqual({ sequences: 1, kmers: 4, distinctContents: 1, totalSymbols: 6 });
  });

  it("should keep a shared content key while another id still holds it", () => {
    index.onCreate(3, "ACGTAC");
    index.onDelete(1, "ACGTAC");

    expect(index.exactIds("ACGTAC")).toEqual([3]);
  });

  it("should replace traces on update", () => {
    index.onUpdate(1, "ACGTAC", "GGGG");

    expect(index.exactIds("ACGTAC")).toEqual([]);
    expect(index.exactIds("GGGG")).toEqual([1]);
    expect([...index.postings("GGG")]).toEqual([1]);
  });

  it("should reject a delete whose content disagrees with the index", () => {
    expect(() => index.onDelete(1, "TTTT")).toThrow(IndexInconsistencyError);
    expect(() => index.onDelete(9, "ACG")).toThrow("Index inconsistency: sequence 9 is not indexed");
  });

  it("should reject indexing an id twice", () => {
    expect(() => index.onCreate(1, "GG")).toThrow("Index inconsistency: sequence 1 is already indexed");
  });

  it("should throw when asked for symbols of an unknown id", () => {
    expect(() => index.symbolsOf(7)).toThrow(IndexInconsistencyError);
  });

  it("should list contents by prefix", () => {
    index.onCreate(3, "ACGA");

    expect(index.prefixEntries("ACG")).toEqual([
      ["ACGA", [3]],
      ["ACGTAC", [1]],
    ]);
  });

  describe("serialization", () => {
    it("should serialize identically regardless of insertion order", () => {
      const records = [
        { id: 1, symbols: "ACGTAC" },
        { id: 2, symbols: "TTACGG" },
        { id: 10, symbols: "AC" },
      ];
      const a = new SequenceIndex({ k: 3, caseSensitive: false });
      const b = new SequenceIndex({ k: 3, caseSensitive: false });
      a.rebuild(records);
      b.rebuild([...records].reverse());

      expect(a.serialize()).toBe(b.serialize());
    });

    it("should serialize identically across two rebuilds of the same records", () => {
      const records = [
        { id: 1, symbols: "ACGTAC" },
        { id: 2, symbols: "TTACGG" },
      ];
      const first = new SequenceIndex({ k: 3, caseSensitive: false });
      first.rebuild(records);
      const once = first.serialize();
      first.rebuild(records);

      expect(first.serialize()).toBe(once);
    });

    it("should produce the documented snapshot shape", () => {
      expect(index.toSnapshot()).toEqual({
        version: 1,
        k: 3,
        caseSensitive: false,
        exact: { ACGTAC: [1], TTACGG: [2] },
        kmers: {
          ACG: [1, 2],
          CGT: [1],
          GTA: [1],
          TAC: [1, 2],
          TTA: [2],
          CGG: [2],
        },
        symbols: { "1": "ACGTAC", "2": "TTACGG" },
      });
    });

    it("should restore an index from its snapshot", () => {
      const restored = SequenceIndex.fromSnapshot(index.toSnapshot());

      expect(restored.serialize()).toBe(index.serialize());
      expect(restored.exactIds("TTACGG")).toEqual([2]);
    });

    it("should reject a snapshot whose tables disagree with its symbols", () => {
      const snapshot = index.toSnapshot();
      snapshot.kmers["CGT"] = [1, 2];

      expect(() => SequenceIndex.fromSnapshot(snapshot)).toThrow(
        "Index inconsistency: snapshot tables disagree with its symbols"
      );
    });

    it("should reject a snapshot holding unnormalized symbols", () => {
      const snapshot = index.toSnapshot();
      snapshot.symbols["1"] = "acgtac";

      expect(() => SequenceIndex.fromSnapshot(snapshot)).toThrow(IndexInconsistencyError);
    });
  });

  describe("diff()", () => {
    it("should report a consistent index", () => {
      expect(
        index.diff([
          { id: 1, symbols: "acgtac" },
          { id: 2, symbols: "TTACGG" },
        ])
      ).toEqual({ consistent: true, missing: [], stale: [], mismatched: [] });
    });

    it("should report missing, stale and mismatched ids", () => {
      const report = index.diff([
        { id: 2, symbols: "GGGG" },
        { id: 5, symbols: "ACG" },
      ]);

      expect(report).toEqual({ consistent: false, missing: [5], stale: [1], mismatched: [2] });
    });
  });
});
