/**
 * Unit tests for MCP error mapping and server observability
 */

import { describe, it, expect, afterEach } from "vitest";
import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { IndexStatsInputSchema, IdSchema } from "../../schemas.js";
import { InvalidInputError, NotFoundError, StorageFailureError } from "@seqindex/sdk";
import { mapErrorToMcp } from "../../server.js";
import { ToolTimeoutError } from "../../tools.js";
import { Logger, errorCode, parseLogLevel } from "../../observability/logger.js";
import { metrics, recordToolExecution } from "../../observability/metrics.js";

describe("mapErrorToMcp", () => {
  it("should map zod failures to InvalidParams", () => {
    const result = IdSchema.safeParse(0);
    expect(result.success).toBe(false);
    if (!result.success) {
      const mapped = mapErrorToMcp(result.error);
      expect(mapped.code).toBe(ErrorCode.InvalidParams);
      expect(mapped.message.startsWith("Validation error: ")).toBe(true);
    }
  });

  it("should map invalid input to InvalidParams", () => {
    expect(mapErrorToMcp(new InvalidInputError("pattern", "must not be empty"))).toEqual({
      code: ErrorCode.InvalidParams,
      message: "Invalid pattern: must not be empty",
    });
  });

  it("should map not found to InvalidRequest", () => {
    expect(mapErrorToMcp(new NotFoundError(5))).toEqual({
      code: ErrorCode.InvalidRequest,
      message: "Sequence not found: 5",
    });
  });

  it("should map timeouts to RequestTimeout", () => {
    expect(mapErrorToMcp(new ToolTimeoutError(50)).code).toBe(ErrorCode.RequestTimeout);
  });

  it("should map everything else to InternalError", () => {
    expect(mapErrorToMcp(new StorageFailureError("write", "/data/x.json"))).toEqual({
      code: ErrorCode.InternalError,
      message: "Storage write failed: /data/x.json",
    });
    expect(mapErrorToMcp("boom")).toEqual({ code: ErrorCode.InternalError, message: "boom" });
  });

  it("should accept empty argument objects for parameterless tools", () => {
    expect(IndexStatsInputSchema.parse({})).toEqual({});
  });
});

describe("Logger", () => {
  it("should write JSON lines at or above the minimum level", () => {
    const lines: string[] = [];
    const log = new Logger("warn", (line) => lines.push(line));

    log.info("ignored", {});
    log.error("tool.error", { tool: "get_sequence" });

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "")).toMatchObject({ level: "error", event: "tool.error", tool: "get_sequence" });
  });

  it("should log tool failures with their error code", () => {
    const lines: string[] = [];
    const log = new Logger("debug", (line) => lines.push(line));

    log.toolCall("get_sequence", 3, false, new NotFoundError(1));

    expect(JSON.parse(lines[0] ?? "")).toMatchObject({
      event: "tool.error",
      err_code: "NOT_FOUND",
      err_message: "Sequence not found: 1",
      duration_ms: 3,
    });
  });

  it("should parse log levels", () => {
    expect(parseLogLevel("DEBUG")).toBe("debug");
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined)).toBe("info");
  });

  it("should fall back to UNKNOWN for errors without a code", () => {
    expect(errorCode(new Error("x"))).toBe("UNKNOWN");
    expect(errorCode(new ToolTimeoutError(1))).toBe("ETIMEDOUT");
  });
});

describe("metrics", () => {
  afterEach(() => {
    metrics.reset();
  });

  it("should count calls, errors and latency per tool", () => {
    recordToolExecution("search_sequences", 4, true);
    recordToolExecution("search_sequences", 8, false, "INVALID_INPUT");

    expect(metrics.getCounter("seqindex.tool.calls_total", { tool: "search_sequences" })).toBe(2);
    expect(
      metrics.getCounter("seqindex.tool.errors_total", { tool: "search_sequences", err_code: "INVALID_INPUT" })
    ).toBe(1);
    expect(metrics.getHistogram("seqindex.tool.latency_ms", { tool: "search_sequences" })).toEqual({
      count: 2,
      sum: 12,
      p50: 4,
      p95: 8,
      p99: 8,
    });
  });
});
