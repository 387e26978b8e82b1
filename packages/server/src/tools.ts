/**
 * MCP tool implementations for the sequence store
 * Every tool returns a text summary, the JSON payload as text, and the same
 * payload as structured content
 */

import type { CallToolResult, Tool } from "@modelcontextprotocol/sdk/types.js";
import {
  CreateSequenceInputSchema,
  DeleteSequenceInputSchema,
  GetSequenceInputSchema,
  IndexStatsInputSchema,
  ListSequencesInputSchema,
  RebuildIndexInputSchema,
  SearchExpressionInputSchema,
  SearchSequencesInputSchema,
  SequenceSnippetInputSchema,
  UpdateSequenceInputSchema,
  VerifyIndexInputSchema,
} from "./schemas.js";
import type { SequenceService } from "./service/sequences.js";
import { errorCode, logger } from "./observability/logger.js";
import { recordToolExecution } from "./observability/metrics.js";

export const TOOL_NAMES = [
  "create_sequence",
  "get_sequence",
  "update_sequence",
  "delete_sequence",
  "list_sequences",
  "search_sequences",
  "search_expression",
  "sequence_snippet",
  "index_stats",
  "verify_index",
  "rebuild_index",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export type ToolHandler = (args: unknown) => Promise<CallToolResult>;

/**
 * Tools that never modify the store
 */
export const READ_ONLY_TOOLS: ReadonlySet<ToolName> = new Set<ToolName>([
  "get_sequence",
  "list_sequences",
  "search_sequences",
  "search_expression",
  "sequence_snippet",
  "index_stats",
  "verify_index",
]);

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((tool) => tool === name);
}

/**
 * Raised when a tool exceeds its time budget
 */
export class ToolTimeoutError extends Error {
  readonly code = "ETIMEDOUT";

  constructor(timeoutMs: number) {
    super(`Tool execution timeout after ${timeoutMs}ms`);
    this.name = "ToolTimeoutError";
  }
}

// Helper to wrap tool execution with timeout, logging, and metrics
async function executeTool<T>(
  toolName: ToolName,
  timeoutMs: number,
  handler: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();
  let success = false;
  let error: Error | undefined;
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => reject(new ToolTimeoutError(timeoutMs)), timeoutMs);
    });

    const result = await Promise.race([handler(), timeoutPromise]);
    success = true;
    return result;
  } catch (err) {
    error = err instanceof Error ? err : new Error(String(err));
    throw err;
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
    const duration = Date.now() - startTime;
    logger.toolCall(toolName, duration, success, error);
    recordToolExecution(toolName, duration, success, error ? errorCode(error) : undefined);
  }
}

/**
 * Build a tool result from a summary line and a JSON payload
 */
function toolResult(summary: string, payload: Record<string, unknown>): CallToolResult {
  return {
    content: [
      { type: "text", text: summary },
      { type: "text", text: JSON.stringify(payload) },
    ],
    structuredContent: payload,
  };
}

/**
 * Bind every tool to a service
 */
export function createToolHandlers(service: SequenceService): Record<ToolName, ToolHandler> {
  return {
    async create_sequence(args) {
      const { symbols, metadata } = CreateSequenceInputSchema.parse(args);

      return executeTool("create_sequence", 5000, async () => {
        const id = await service.create(symbols, metadata);
        return toolResult(`Created sequence ${id}`, { id });
      });
    },

    async get_sequence(args) {
      const { id } = GetSequenceInputSchema.parse(args);

      return executeTool("get_sequence", 2000, async () => {
        const sequence = await service.get(id);
        return toolResult(`Found sequence ${id}`, { sequence });
      });
    },

    async update_sequence(args) {
      const { id, symbols, metadata } = UpdateSequenceInputSchema.parse(args);

      return executeTool("update_sequence", 5000, async () => {
        const sequence = await service.update(id, symbols, metadata);
        return toolResult(`Updated sequence ${id}`, { sequence });
      });
    },

    async delete_sequence(args) {
      const { id } = DeleteSequenceInputSchema.parse(args);

      return executeTool("delete_sequence", 5000, async () => {
        await service.remove(id);
        return toolResult(`Deleted sequence ${id}`, { ok: true, id });
      });
    },

    async list_sequences(args) {
      const { offset, limit } = ListSequencesInputSchema.parse(args ?? {});

      return executeTool("list_sequences", 2000, async () => {
        const page = await service.list(offset, limit);
        return toolResult(`Listed ${page.items.length} of ${page.total} sequences`, {
          items: page.items,
          total: page.total,
          nextOffset: page.nextOffset,
        });
      });
    },

    async search_sequences(args) {
      const { pattern, mode, limit, threshold } = SearchSequencesInputSchema.parse(args);

      return executeTool("search_sequences", 5000, async () => {
        const results = await service.search(pattern, mode, { limit, threshold });
        return toolResult(`Found ${results.length} matching sequences`, {
          results,
          count: results.length,
        });
      });
    },

    async search_expression(args) {
      const { expression, limit } = SearchExpressionInputSchema.parse(args);

      return executeTool("search_expression", 5000, async () => {
        const results = await service.searchExpression(expression, limit);
        return toolResult(`Found ${results.length} matching sequences`, {
          results,
          count: results.length,
        });
      });
    },

    async sequence_snippet(args) {
      const { id, pattern, width, open, close } = SequenceSnippetInputSchema.parse(args);

      return executeTool("sequence_snippet", 2000, async () => {
        const snippet = await service.snippet(id, pattern, { width, open, close });
        return toolResult(snippet.excerpt, { snippet });
      });
    },

    async index_stats(args) {
      IndexStatsInputSchema.parse(args ?? {});

      return executeTool("index_stats", 2000, async () => {
        const stats = await service.stats();
        return toolResult(`Indexed ${stats.sequences} sequences with ${stats.kmers} k-mers`, { stats });
      });
    },

    async verify_index(args) {
      VerifyIndexInputSchema.parse(args ?? {});

      return executeTool("verify_index", 30000, async () => {
        const report = await service.verify();
        const summary = report.consistent
          ? "Index is consistent with the store"
          : `Index is inconsistent: ${report.missing.length} missing, ${report.stale.length} stale, ${report.mismatched.length} mismatched`;
        return toolResult(summary, { report });
      });
    },

    async rebuild_index(args) {
      RebuildIndexInputSchema.parse(args ?? {});

      return executeTool("rebuild_index", 30000, async () => {
        const report = await service.rebuild();
        return toolResult(`Rebuilt index over ${report.sequences} sequences`, { report });
      });
    },
  };
}

const idProperty = {
  type: "integer",
  minimum: 1,
  description: "Sequence id",
};

const metadataProperty = {
  type: "object",
  description: "Optional metadata",
  properties: {
    name: { type: "string", description: "Human-readable name (max 200 characters)" },
    tags: {
      type: "array",
      items: { type: "string" },
      description: "Distinct labels without whitespace",
    },
  },
  additionalProperties: false,
};

const limitProperty = {
  type: "integer",
  minimum: 0,
  maximum: 1000,
  description: "Maximum number of results (default 100)",
};

/**
 * Tool definitions for MCP server
 */
export const toolDefinitions: Tool[] = [
  {
    name: "create_sequence",
    description: "Store a new sequence and return its id",
    inputSchema: {
      type: "object",
      properties: {
        symbols: { type: "string", description: "Non-empty symbols without whitespace" },
        metadata: metadataProperty,
      },
      required: ["symbols"],
    },
  },
  {
    name: "get_sequence",
    description: "Read a sequence by id",
    inputSchema: {
      type: "object",
      properties: { id: idProperty },
      required: ["id"],
    },
  },
  {
    name: "update_sequence",
    description: "Replace the symbols of a sequence; metadata is kept unless provided",
    inputSchema: {
      type: "object",
      properties: {
        id: idProperty,
        symbols: { type: "string", description: "New symbols" },
        metadata: metadataProperty,
      },
      required: ["id", "symbols"],
    },
  },
  {
    name: "delete_sequence",
    description: "Delete a sequence and remove it from the index",
    inputSchema: {
      type: "object",
      properties: { id: idProperty },
      required: ["id"],
    },
  },
  {
    name: "list_sequences",
    description: "List sequences in id order (limit max 1000, default 50)",
    inputSchema: {
      type: "object",
      properties: {
        offset: { type: "integer", minimum: 0, description: "Number of sequences to skip" },
        limit: { type: "integer", minimum: 1, maximum: 1000, description: "Page size" },
      },
    },
  },
  {
    name: "search_sequences",
    description: "Search sequences by exact, contains, fuzzy or prefix match",
    inputSchema: {
      type: "object",
      properties: {
        pattern: { type: "string", description: "Pattern without whitespace" },
        mode: {
          type: "string",
          enum: ["exact", "contains", "fuzzy", "prefix"],
          description: "Match mode (default contains)",
        },
        limit: limitProperty,
        threshold: {
          type: "number",
          minimum: 0,
          maximum: 1,
          description: "Minimum fuzzy score for this query",
        },
      },
      required: ["pattern"],
    },
  },
  {
    name: "search_expression",
    description: "Search with AND, OR, parentheses and quoted terms over contained patterns",
    inputSchema: {
      type: "object",
      properties: {
        expression: { type: "string", description: 'e.g. ACG AND (TTA OR "GGC")' },
        limit: limitProperty,
      },
      required: ["expression"],
    },
  },
  {
    name: "sequence_snippet",
    description: "Excerpt of a sequence around the first occurrence of a pattern",
    inputSchema: {
      type: "object",
      properties: {
        id: idProperty,
        pattern: { type: "string", description: "Pattern to highlight" },
        width: { type: "integer", minimum: 0, description: "Symbols of context on each side (default 10)" },
        open: { type: "string", description: "Marker before each occurrence (default [)" },
        close: { type: "string", description: "Marker after each occurrence (default ])" },
      },
      required: ["id", "pattern"],
    },
  },
  {
    name: "index_stats",
    description: "Store and index statistics",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "verify_index",
    description: "Compare the index with the stored sequences without repairing it",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "rebuild_index",
    description: "Rebuild the index from the stored sequences",
    inputSchema: { type: "object", properties: {} },
  },
];
