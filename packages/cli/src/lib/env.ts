/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { parseFlag, parseK, parseThreshold } from "./arg.js";

/**
 * Engine settings accepted on the command line
 */
export interface EngineFlags {
  k?: number;
  threshold?: number;
  caseSensitive?: boolean;
}

/**
 * Engine settings after merging flags and environment
 */
export interface EngineSettings {
  k?: number;
  fuzzyThreshold?: number;
  caseSensitive?: boolean;
}

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // "~user" references are left untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the store root directory
 * Priority: CLI option > SEQINDEX_ROOT env var > default "./data"
 */
export function resolveRoot(cliRoot?: string, env: NodeJS.ProcessEnv = process.env): string {
  const root = cliRoot ?? env.SEQINDEX_ROOT ?? "./data";
  return path.resolve(expandTilde(root));
}

/**
 * Resolve engine settings
 * Priority: CLI flags > SEQINDEX_K / SEQINDEX_FUZZY_THRESHOLD / SEQINDEX_CASE_SENSITIVE
 * Unset values fall through to the SDK defaults.
 */
export function resolveEngineSettings(
  flags: EngineFlags,
  env: NodeJS.ProcessEnv = process.env
): EngineSettings {
  const settings: EngineSettings = {};

  const k = flags.k ?? (env.SEQINDEX_K ? parseK(env.SEQINDEX_K) : undefined);
  if (k !== undefined) {
    settings.k = k;
  }

  const threshold =
    flags.threshold ??
    (env.SEQINDEX_FUZZY_THRESHOLD ? parseThreshold(env.SEQINDEX_FUZZY_THRESHOLD) : undefined);
  if (threshold !== undefined) {
    settings.fuzzyThreshold = threshold;
  }

  const caseSensitive =
    flags.caseSensitive ??
    (env.SEQINDEX_CASE_SENSITIVE !== undefined
      ? parseFlag(env.SEQINDEX_CASE_SENSITIVE, "SEQINDEX_CASE_SENSITIVE")
      : undefined);
  if (caseSensitive !== undefined) {
    settings.caseSensitive = caseSensitive;
  }

  return settings;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.SEQINDEX_CLI_DEBUG === "1";
}
