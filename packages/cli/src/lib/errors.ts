/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { SeqIndexError } from "@seqindex/sdk";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Map SDK errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/storage/unknown error
 * - 2: sequence not found
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof CommanderError) {
    return error.exitCode;
  }

  if (error instanceof SeqIndexError) {
    return error.code === "NOT_FOUND" ? 2 : 1;
  }

  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause !== undefined) {
      message += `\n  Cause: ${error.cause instanceof Error ? error.cause.message : String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
