#!/usr/bin/env -S node --import tsx

/**
 * stdio entry point for the MCP server
 *
 * Environment:
 * - DATA_ROOT: store directory (default ./data)
 * - MCP_SEQINDEX_READONLY=true: expose only read tools
 * - MCP_SEQINDEX_ENABLED=false: exit immediately
 * - LOG_LEVEL: debug, info, warn or error
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServer } from "./server.js";
import { SequenceService } from "./service/sequences.js";
import { logger } from "./observability/logger.js";

async function main(): Promise<void> {
  // MCP protocol uses stdout, so any stray console.log/info/debug breaks it
  const redirectToStderr =
    (method: string) =>
    (...args: unknown[]): void => {
      console.error(`[WARN] Attempted ${method} (redirected to stderr):`, ...args);
    };
  console.log = redirectToStderr("console.log");
  console.info = redirectToStderr("console.info");
  console.debug = redirectToStderr("console.debug");

  const readOnly = process.env.MCP_SEQINDEX_READONLY === "true";
  const enabled = process.env.MCP_SEQINDEX_ENABLED !== "false";

  if (!enabled) {
    console.error("MCP seqindex server is disabled (MCP_SEQINDEX_ENABLED=false)");
    return;
  }

  const dataRoot = process.env.DATA_ROOT || "./data";
  const service = SequenceService.open(dataRoot);
  const server = createServer({ service, readOnly });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("server.start", {
    mode: readOnly ? "readonly" : "readwrite",
    data_root: dataRoot,
  });

  const shutdown = async (): Promise<void> => {
    logger.info("server.shutdown", {});
    await server.close();
    await service.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.error("server.shutdown.failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
  logger.error("server.fatal", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
