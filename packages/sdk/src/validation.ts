/**
 * Validation utilities for store and query inputs
 *
 * Every function throws InvalidInputError naming the offending field.
 */

import { InvalidInputError } from "./errors.js";
import { MATCH_MODES } from "./types.js";
import type {
  EngineConfig,
  MatchMode,
  PageRequest,
  SearchOptions,
  SequenceId,
  SequenceMetadata,
  SnippetOptions,
  StoreOptions,
} from "./types.js";

/** Longest sequence or pattern accepted */
export const MAX_SYMBOLS_LENGTH = 1_000_000;

/** Longest metadata name accepted */
export const MAX_NAME_LENGTH = 200;

/** Largest supported k-mer length */
export const MAX_K = 32;

/** Largest page size */
export const MAX_PAGE_SIZE = 1000;

const WHITESPACE = /\s/u;

/**
 * Validate a symbol string (stored sequence or query pattern)
 * @param value - Value to validate
 * @param label - Field name for error messages
 */
export function validateSymbols(value: unknown, label = "symbols"): asserts value is string {
  if (typeof value !== "string") {
    throw new InvalidInputError(label, "must be a string");
  }

  if (value.length === 0) {
    throw new InvalidInputError(label, "must not be empty");
  }

  if (value.length > MAX_SYMBOLS_LENGTH) {
    throw new InvalidInputError(label, `must be at most ${MAX_SYMBOLS_LENGTH} symbols`);
  }

  if (WHITESPACE.test(value)) {
    throw new InvalidInputError(label, "must not contain whitespace");
  }
}

/**
 * Validate a query pattern
 */
export function validatePattern(value: unknown): asserts value is string {
  validateSymbols(value, "pattern");
}

/**
 * Check normalized symbols against a fixed alphabet
 * @param normalized - Symbols after normalization
 * @param alphabet - Normalized alphabet
 */
export function validateAlphabet(normalized: string, alphabet: string, label = "symbols"): void {
  const allowed = new Set(alphabet);
  for (const ch of normalized) {
    if (!allowed.has(ch)) {
      throw new InvalidInputError(label, `symbol "${ch}" is not in the alphabet "${alphabet}"`);
    }
  }
}

/**
 * Narrow an unknown value to a match mode
 */
export function isMatchMode(value: unknown): value is MatchMode {
  return typeof value === "string" && MATCH_MODES.some((mode) => mode === value);
}

/**
 * Validate a match mode
 */
export function validateMode(value: unknown): asserts value is MatchMode {
  if (!isMatchMode(value)) {
    throw new InvalidInputError(
      "mode",
      `expected one of ${MATCH_MODES.join(", ")}, got ${JSON.stringify(value)}`
    );
  }
}

/**
 * Validate a sequence id
 */
export function validateId(value: unknown): asserts value is SequenceId {
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 1) {
    throw new InvalidInputError("id", `must be a positive integer, got ${JSON.stringify(value)}`);
  }
}

/**
 * Validate metadata and return a clean copy without undefined fields
 */
export function validateMetadata(value: unknown): SequenceMetadata {
  if (value === undefined || value === null) {
    return {};
  }

  if (typeof value !== "object" || Array.isArray(value)) {
    throw new InvalidInputError("metadata", "must be an object");
  }

  const out: SequenceMetadata = {};
  for (const [key, field] of Object.entries(value)) {
    if (field === undefined) {
      continue;
    }

    if (key === "name") {
      if (typeof field !== "string" || field.trim().length === 0) {
        throw new InvalidInputError("metadata.name", "must be a non-empty string");
      }
      if (field.length > MAX_NAME_LENGTH) {
        throw new InvalidInputError("metadata.name", `must be at most ${MAX_NAME_LENGTH} characters`);
      }
      out.name = field;
    } else if (key === "tags") {
      out.tags = validateTags(field);
    } else {
      throw new InvalidInputError("metadata", `unknown field "${key}"`);
    }
  }

  return out;
}

function validateTags(value: unknown): string[] {
  if (!Array.isArray(value)) {
    throw new InvalidInputError("metadata.tags", "must be an array of strings");
  }

  const seen = new Set<string>();
  for (const tag of value) {
    if (typeof tag !== "string" || tag.length === 0 || WHITESPACE.test(tag)) {
      throw new InvalidInputError("metadata.tags", "tags must be non-empty strings without whitespace");
    }
    if (seen.has(tag)) {
      throw new InvalidInputError("metadata.tags", `duplicate tag "${tag}"`);
    }
    seen.add(tag);
  }

  return [...seen];
}

/**
 * Validate per-query options
 */
export function validateSearchOptions(options: SearchOptions | undefined): SearchOptions {
  if (options === undefined) {
    return {};
  }

  if (options.limit !== undefined && (!Number.isInteger(options.limit) || options.limit < 0)) {
    throw new InvalidInputError("limit", "must be a non-negative integer");
  }

  if (options.threshold !== undefined) {
    validateThreshold(options.threshold, "threshold");
  }

  return options;
}

/**
 * Validate snippet options and fill in defaults
 */
export function resolveSnippetOptions(options: SnippetOptions | undefined): Required<SnippetOptions> {
  const width = options?.width ?? 10;
  if (!Number.isInteger(width) || width < 0) {
    throw new InvalidInputError("width", "must be a non-negative integer");
  }

  return {
    width,
    open: options?.open ?? "[",
    close: options?.close ?? "]",
  };
}

/**
 * Validate a page request and fill in defaults
 */
export function resolvePageRequest(request: PageRequest | undefined): Required<PageRequest> {
  const offset = request?.offset ?? 0;
  const limit = request?.limit ?? 50;

  if (!Number.isInteger(offset) || offset < 0) {
    throw new InvalidInputError("offset", "must be a non-negative integer");
  }

  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_SIZE) {
    throw new InvalidInputError("limit", `must be an integer between 1 and ${MAX_PAGE_SIZE}`);
  }

  return { offset, limit };
}

function validateThreshold(value: number, label: string): void {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidInputError(label, "must be a number between 0 and 1");
  }
}

/**
 * Resolve store options into an engine configuration
 *
 * Defaults: k = 3, fuzzyThreshold = 0.5, caseSensitive = false, persistIndex = true
 */
export function resolveEngineConfig(options: StoreOptions): EngineConfig {
  const k = options.k ?? 3;
  if (!Number.isInteger(k) || k < 1 || k > MAX_K) {
    throw new InvalidInputError("k", `must be an integer between 1 and ${MAX_K}`);
  }

  const fuzzyThreshold = options.fuzzyThreshold ?? 0.5;
  validateThreshold(fuzzyThreshold, "fuzzyThreshold");

  let alphabet: string | null = null;
  if (options.alphabet !== undefined) {
    validateSymbols(options.alphabet, "alphabet");
    alphabet = options.alphabet;
  }

  return {
    k,
    fuzzyThreshold,
    caseSensitive: options.caseSensitive ?? false,
    alphabet,
    persistIndex: options.persistIndex ?? true,
  };
}
