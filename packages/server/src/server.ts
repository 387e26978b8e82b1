/**
 * MCP server for the sequence store
 * Exposes CRUD and search capabilities as MCP tools
 *
 * Protocol: Model Context Protocol (MCP)
 * All logging goes to stderr; stdout is reserved for protocol frames
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { InvalidInputError, NotFoundError } from "@seqindex/sdk";
import {
  READ_ONLY_TOOLS,
  ToolTimeoutError,
  createToolHandlers,
  isToolName,
  toolDefinitions,
} from "./tools.js";
import type { SequenceService } from "./service/sequences.js";
import { errorCode, logger } from "./observability/logger.js";

export const SERVER_NAME = "seqindex-server";
export const SERVER_VERSION = "0.1.0";

export interface ServerOptions {
  service: SequenceService;
  /** Expose only tools that never modify the store */
  readOnly?: boolean;
}

/**
 * Map store and validation errors to MCP error codes
 */
export function mapErrorToMcp(error: unknown): { code: number; message: string } {
  if (error instanceof z.ZodError) {
    return {
      code: ErrorCode.InvalidParams,
      message: `Validation error: ${error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join(", ")}`,
    };
  }

  if (error instanceof InvalidInputError) {
    return { code: ErrorCode.InvalidParams, message: error.message };
  }

  if (error instanceof NotFoundError) {
    return { code: ErrorCode.InvalidRequest, message: error.message };
  }

  if (error instanceof ToolTimeoutError) {
    return { code: ErrorCode.RequestTimeout, message: error.message };
  }

  if (error instanceof Error) {
    return { code: ErrorCode.InternalError, message: error.message };
  }

  return { code: ErrorCode.InternalError, message: String(error) };
}

/**
 * Create and configure the MCP server
 */
export function createServer(options: ServerOptions): Server {
  const readOnly = options.readOnly ?? false;
  const handlers = createToolHandlers(options.service);

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const tools = readOnly
      ? toolDefinitions.filter((tool) => isToolName(tool.name) && READ_ONLY_TOOLS.has(tool.name))
      : toolDefinitions;

    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      if (!isToolName(name)) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }

      if (readOnly && !READ_ONLY_TOOLS.has(name)) {
        throw new McpError(ErrorCode.InvalidRequest, `Tool '${name}' not available in read-only mode`);
      }

      return await handlers[name](args);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error("server.tool.error", {
        tool: name,
        err_code: errorCode(err),
        err_message: err.message,
        stack: err.stack,
      });

      if (error instanceof McpError) {
        throw error;
      }

      const { code, message } = mapErrorToMcp(error);
      throw new McpError(code, message);
    }
  });

  return server;
}
