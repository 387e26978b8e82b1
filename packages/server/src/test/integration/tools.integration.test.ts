/**
 * Integration tests for MCP tools
 * Tests the full flow of tool execution against an in-memory store
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { z } from "zod";
import { MemorySequenceRepository, NotFoundError, logger as sdkLogger, openStore } from "@seqindex/sdk";
import { createToolHandlers, type ToolHandler, type ToolName } from "../../tools.js";
import { SequenceService } from "../../service/sequences.js";
import { metrics } from "../../observability/metrics.js";

let repository: MemorySequenceRepository;
let service: SequenceService;
let tools: Record<ToolName, ToolHandler>;

beforeEach(() => {
  sdkLogger.setEnabled(false);
  repository = new MemorySequenceRepository();
  service = new SequenceService(openStore({ repository }));
  tools = createToolHandlers(service);
});

afterEach(async () => {
  await service.close();
  metrics.reset();
  sdkLogger.setEnabled(true);
});

async function seed(): Promise<void> {
  await tools.create_sequence({ symbols: "ACGTAC", metadata: { name: "probe-1" } });
  await tools.create_sequence({ symbols: "TTACGG" });
}

describe("Tool integration tests", () => {
  describe("create_sequence and get_sequence", () => {
    it("should store and retrieve a sequence", async () => {
      const created = await tools.create_sequence({ symbols: "ACGTAC", metadata: { tags: ["probe"] } });

      expect(created.content).toEqual([
        { type: "text", text: "Created sequence 1" },
        { type: "text", text: '{"id":1}' },
      ]);
      expect(created.structuredContent).toEqual({ id: 1 });

      const got = await tools.get_sequence({ id: 1 });
      expect(got.structuredContent).toMatchObject({
        sequence: { id: 1, symbols: "ACGTAC", metadata: { tags: ["probe"] } },
      });
    });

    it("should reject invalid input before touching the store", async () => {
      await expect(tools.create_sequence({ symbols: "AC GT" })).rejects.toBeInstanceOf(z.ZodError);
      await expect(tools.get_sequence({ id: "1" })).rejects.toBeInstanceOf(z.ZodError);
    });

    it("should fail with NotFoundError for unknown ids", async () => {
      await expect(tools.get_sequence({ id: 42 })).rejects.toBeInstanceOf(NotFoundError);
      expect(metrics.getCounter("seqindex.tool.errors_total", { tool: "get_sequence", err_code: "NOT_FOUND" })).toBe(1);
    });
  });

  describe("update_sequence and delete_sequence", () => {
    it("should replace symbols and keep metadata", async () => {
      await seed();

      const updated = await tools.update_sequence({ id: 1, symbols: "TTAGGC" });

      expect(updated.structuredContent).toMatchObject({
        sequence: { id: 1, symbols: "TTAGGC", metadata: { name: "probe-1" } },
      });
    });

    it("should remove a sequence from search results", async () => {
      await seed();

      const deleted = await tools.delete_sequence({ id: 1 });
      expect(deleted.structuredContent).toEqual({ ok: true, id: 1 });

      const search = await tools.search_sequences({ pattern: "ACG" });
      expect(search.structuredContent).toEqual({ results: [{ id: 2, score: 1 }], count: 1 });
    });
  });

  describe("list_sequences", () => {
    it("should page through sequences", async () => {
      await seed();

      const page = await tools.list_sequences({ limit: 1 });

      expect(page.content[0]).toEqual({ type: "text", text: "Listed 1 of 2 sequences" });
      expect(page.structuredContent).toMatchObject({ total: 2, nextOffset: 1, items: [{ id: 1 }] });
    });

    it("should accept missing arguments", async () => {
      const page = await tools.list_sequences(undefined);

      expect(page.structuredContent).toEqual({ items: [], total: 0, nextOffset: null });
    });
  });

  describe("search tools", () => {
    it("should search in every mode", async () => {
      await seed();

      const exact = await tools.search_sequences({ pattern: "ACGTAC", mode: "exact" });
      const contains = await tools.search_sequences({ pattern: "ACG" });
      const prefix = await tools.search_sequences({ pattern: "TTA", mode: "prefix" });
      const fuzzy = await tools.search_sequences({ pattern: "ACGTAA", mode: "fuzzy", threshold: 0.8 });

      expect(exact.structuredContent).toEqual({ results: [{ id: 1, score: 1 }], count: 1 });
      expect(contains.structuredContent).toEqual({
        results: [
          { id: 1, score: 1 },
          { id: 2, score: 1 },
        ],
        count: 2,
      });
      expect(prefix.structuredContent).toEqual({ results: [{ id: 2, score: 0.5 }], count: 1 });
      expect(fuzzy.structuredContent).toEqual({ results: [{ id: 1, score: 1 - 1 / 6 }], count: 1 });
    });

    it("should apply the limit", async () => {
      await seed();

      const limited = await tools.search_sequences({ pattern: "ACG", limit: 1 });

      expect(limited.structuredContent).toEqual({ results: [{ id: 1, score: 1 }], count: 1 });
    });

    it("should evaluate boolean expressions", async () => {
      await seed();

      const result = await tools.search_expression({ expression: "ACG OR TTA" });

      expect(result.structuredContent).toEqual({
        results: [
          { id: 1, score: 0 },
          { id: 2, score: 0 },
        ],
        count: 2,
      });
    });
  });

  describe("sequence_snippet", () => {
    it("should return the excerpt as the summary", async () => {
      await seed();

      const result = await tools.sequence_snippet({ id: 1, pattern: "GTA", width: 1 });

      expect(result.content[0]).toEqual({ type: "text", text: "...C[GTA]C" });
      expect(result.structuredContent).toEqual({
        snippet: { id: 1, excerpt: "...C[GTA]C", position: 2, occurrences: 1 },
      });
    });
  });

  describe("index_stats and rebuild_index", () => {
    it("should report statistics and rebuild", async () => {
      await seed();

      const stats = await tools.index_stats({});
      expect(stats.content[0]).toEqual({ type: "text", text: "Indexed 2 sequences with 6 k-mers" });

      const rebuilt = await tools.rebuild_index(undefined);
      expect(rebuilt.content[0]).toEqual({ type: "text", text: "Rebuilt index over 2 sequences" });
      expect(rebuilt.structuredContent).toMatchObject({
        report: { sequences: 2, kmers: 6, distinctContents: 2, attempts: 1 },
      });
    });
  });

  describe("verify_index", () => {
    it("should report a consistent index", async () => {
      await seed();

      const result = await tools.verify_index({});

      expect(result.content[0]).toEqual({ type: "text", text: "Index is consistent with the store" });
      expect(result.structuredContent).toEqual({
        report: { consistent: true, missing: [], stale: [], mismatched: [] },
      });
    });

    it("should report records missing from the index", async () => {
      await seed();
      const now = new Date().toISOString();
      await repository.put({ id: 3, symbols: "GGGCCC", metadata: {}, createdAt: now, updatedAt: now });

      const result = await tools.verify_index({});

      expect(result.content[0]).toEqual({
        type: "text",
        text: "Index is inconsistent: 1 missing, 0 stale, 0 mismatched",
      });
    });
  });
});
