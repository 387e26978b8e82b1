/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { isMatchMode, MATCH_MODES, MAX_K, MAX_PAGE_SIZE, type MatchMode } from "@seqindex/sdk";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string, max = 10000): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  if (parsed > max) {
    throw new InvalidArgumentError(`${name} must be <= ${max}`);
  }

  return parsed;
}

/**
 * Parse a sequence id
 */
export function parseId(value: string): number {
  const trimmed = value.trim();

  if (!/^[1-9]\d*$/.test(trimmed) || !Number.isSafeInteger(Number(trimmed))) {
    throw new InvalidArgumentError("id must be a positive integer");
  }

  return Number(trimmed);
}

/**
 * Parse the k-mer length
 */
export function parseK(value: string): number {
  const parsed = parseNonNegativeInt(value, "k", MAX_K);
  if (parsed < 1) {
    throw new InvalidArgumentError(`k must be between 1 and ${MAX_K}`);
  }
  return parsed;
}

/**
 * Parse a page size
 */
export function parseLimit(value: string): number {
  const parsed = parseNonNegativeInt(value, "limit", MAX_PAGE_SIZE);
  if (parsed < 1) {
    throw new InvalidArgumentError(`limit must be between 1 and ${MAX_PAGE_SIZE}`);
  }
  return parsed;
}

/**
 * Parse a fuzzy threshold in [0, 1]
 */
export function parseThreshold(value: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);

  if (trimmed.length === 0 || !Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError("threshold must be a number between 0 and 1");
  }

  return parsed;
}

/**
 * Parse a match mode
 */
export function parseMode(value: string): MatchMode {
  if (!isMatchMode(value)) {
    throw new InvalidArgumentError(`mode must be one of ${MATCH_MODES.join(", ")}`);
  }
  return value;
}

/**
 * Parse a boolean-ish environment value ("1", "true", "yes", "0", "false", "no")
 */
export function parseFlag(value: string, name: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "") {
    return false;
  }
  throw new InvalidArgumentError(`${name} must be a boolean (1/0, true/false, yes/no)`);
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Collect a repeatable option into an array
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}
