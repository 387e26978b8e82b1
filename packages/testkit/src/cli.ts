/**
 * CLI testing utilities
 *
 * Runs the CLI from its TypeScript sources in a child process through tsx.
 */

import { execa } from "execa";
import { fileURLToPath } from "node:url";

/**
 * CLI entry point source file
 */
export const CLI_ENTRY = fileURLToPath(new URL("../../cli/src/cli.ts", import.meta.url));

/**
 * Repository root, where tsx is resolved from
 */
export const WORKSPACE_ROOT = fileURLToPath(new URL("../../../", import.meta.url));

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code (null if process was killed by signal) */
  exitCode: number | null;
  /** Terminating signal when the process didn't exit normally */
  signal: string | null;
}

/**
 * Options for CLI execution
 */
export interface CliExecOptions {
  /** Environment variables */
  env?: Record<string, string>;
  /** Input to pass to stdin */
  input?: string;
  /** Kill the process after this many milliseconds (default: 30000) */
  timeout?: number;
}

/**
 * Execute a CLI command; non-zero exits are returned, not thrown
 * @param args - Command arguments
 * @param options - Execution options
 */
export async function runCli(args: string[], options: CliExecOptions = {}): Promise<CliResult> {
  const { env, input, timeout = 30000 } = options;

  const result = await execa("node", ["--import", "tsx", CLI_ENTRY, ...args], {
    cwd: WORKSPACE_ROOT,
    env: { ...process.env, ...env },
    input: input ?? "",
    reject: false,
    timeout,
  });

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode ?? null,
    signal: result.signal ?? null,
  };
}

/**
 * Parse JSON output from CLI
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
