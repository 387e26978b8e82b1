import { describe, it, expect, beforeEach, afterEach, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, readFile, writeFile, unlink, mkdir } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { StorageFailureError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { openStore } from "./store.js";
import type { SequenceStore } from "./types.js";

describe("file-backed store", () => {
  let testDir: string;
  let store: SequenceStore;

  beforeAll(() => {
    logger.setEnabled(false);
  });

  afterAll(() => {
    logger.setEnabled(true);
  });

  beforeEach(async () => {
    metrics.reset();
    testDir = await mkdtemp(join(tmpdir(), "seqindex-test-"));
    store = openStore({ root: testDir });
  });

  afterEach(async () => {
    await store.close();
    await rm(testDir, { recursive: true, force: true });
  });

  async function reopen(options: { k?: number } = {}): Promise<SequenceStore> {
    await store.close();
    store = openStore({ root: testDir, ...options });
    return store;
  }

  it("should write canonical record files", async () => {
    await store.create("ACGTAC", { tags: ["b", "a"], name: "probe" });

    const record: Record<string, unknown> = JSON.parse(await readFile(join(testDir, "sequences", "1.json"), "utf-8"));
    expect(Object.keys(record)).toEqual(["id", "symbols", "metadata", "createdAt", "updatedAt"]);
    expect(record).toMatchObject({ id: 1, symbols: "ACGTAC", metadata: { name: "probe", tags: ["b", "a"] } });
  });

  it("should persist the id counter", async () => {
    await store.create("ACGTAC");
    await store.create("TTACGG");

    const meta: unknown = JSON.parse(await readFile(join(testDir, "_meta", "store.json"), "utf-8"));
    expect(meta).toEqual({ version: 1, nextId: 3 });

    await store.delete(2);
    await reopen();
    expect(await store.create("GGG")).toBe(3);
  });

  it("should write the index snapshot when the store closes", async () => {
    await store.create("ACGTAC");
    await store.create("TTACGG");
    await store.delete(1);

    const before: unknown = JSON.parse(await readFile(join(testDir, "_indexes", "sequences.json"), "utf-8"));
    expect(before).toEqual({ version: 1, k: 3, caseSensitive: false, exact: {}, kmers: {}, symbols: {} });

    await store.close();
    const snapshot: unknown = JSON.parse(await readFile(join(testDir, "_indexes", "sequences.json"), "utf-8"));
    expect(snapshot).toEqual({
      version: 1,
      k: 3,
      caseSensitive: false,
      exact: { TTACGG: [2] },
      kmers: { ACG: [2], CGG: [2], TAC: [2], TTA: [2] },
      symbols: { "2": "TTACGG" },
    });
  });

  it("should reopen from the snapshot without rebuilding", async () => {
    await store.create("ACGTAC");
    await reopen();
    metrics.reset();

    expect(await store.search("ACGTAC", "exact")).toEqual([{ id: 1, score: 1 }]);
    expect(metrics.getMetrics("rebuild")).toBeUndefined();
  });

  it("should rebuild after an interrupted mutation", async () => {
    await store.create("ACGTAC");
    await store.close();

    // A record written just before a crash, with its journal entry still present
    const now = new Date().toISOString();
    await writeFile(
      join(testDir, "sequences", "2.json"),
      JSON.stringify({ id: 2, symbols: "TTACGG", metadata: {}, createdAt: now, updatedAt: now })
    );
    await writeFile(join(testDir, "_meta", "journal.json"), JSON.stringify({ op: "create", id: 2, startedAt: now }));

    await reopen();
    expect(await store.search("TTACGG", "exact")).toEqual([{ id: 2, score: 1 }]);
    await expect(readFile(join(testDir, "_meta", "journal.json"), "utf-8")).rejects.toMatchObject({ code: "ENOENT" });
    expect(await store.create("GGG")).toBe(3);
  });

  it("should rebuild when the snapshot is corrupt", async () => {
    await store.create("ACGTAC");
    await store.close();
    await writeFile(join(testDir, "_indexes", "sequences.json"), "{ corrupt");

    store = openStore({ root: testDir });
    expect(await store.search("ACG", "contains")).toEqual([{ id: 1, score: 1 }]);

    const repaired: unknown = JSON.parse(await readFile(join(testDir, "_indexes", "sequences.json"), "utf-8"));
    expect(repaired).toMatchObject({ symbols: { "1": "ACGTAC" } });
  });

  it("should rebuild when records changed behind the index", async () => {
    await store.create("ACGTAC");
    await store.create("TTACGG");
    await unlink(join(testDir, "sequences", "2.json"));

    await reopen();
    expect(await store.search("TTACGG", "exact")).toEqual([]);
    expect(await store.verify()).toEqual({ consistent: true, missing: [], stale: [], mismatched: [] });
  });

  it("should rebuild when reopened with another k", async () => {
    await store.create("ACGTAC");

    await reopen({ k: 4 });
    expect(await store.stats()).toMatchObject({ sequences: 1, k: 4, kmers: 3 });
  });

  it("should report unreadable records as storage failures", async () => {
    await store.close();
    await mkdir(join(testDir, "sequences"), { recursive: true });
    await writeFile(join(testDir, "sequences", "1.json"), "not json");

    store = openStore({ root: testDir });
    await expect(store.search("ACG", "contains")).rejects.toThrow(StorageFailureError);
    await expect(store.read(1)).rejects.toMatchObject({ code: "STORAGE_FAILURE", operation: "parse" });
  });
});
